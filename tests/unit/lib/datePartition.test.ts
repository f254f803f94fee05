import {
  exactDaysAgo,
  mondayTwoWeeksAgo,
  resolveDatePartition,
} from '../../../src/lib/datePartition';
import { ConfigurationError } from '../../../src/lib/errors';

// 2024-03-18 is a Monday, 2024-03-20 a Wednesday
const MONDAY = new Date('2024-03-18T06:00:00Z');
const WEDNESDAY = new Date('2024-03-20T15:30:00Z');

describe('mondayTwoWeeksAgo', () => {
  it('returns the Monday two weeks before the current week', () => {
    expect(mondayTwoWeeksAgo(MONDAY)).toBe('2024-03-04');
    expect(mondayTwoWeeksAgo(WEDNESDAY)).toBe('2024-03-04');
  });

  it('treats Sunday as the end of the week', () => {
    expect(mondayTwoWeeksAgo(new Date('2024-03-24T23:00:00Z'))).toBe('2024-03-04');
  });
});

describe('exactDaysAgo', () => {
  it('defaults to 14 days', () => {
    expect(exactDaysAgo(WEDNESDAY)).toBe('2024-03-06');
  });

  it('crosses month boundaries', () => {
    expect(exactDaysAgo(new Date('2024-03-02T00:00:00Z'), 3)).toBe('2024-02-28');
  });
});

describe('resolveDatePartition', () => {
  it('uses Monday two weeks ago on scheduled Monday runs', () => {
    expect(resolveDatePartition({}, MONDAY)).toBe('2024-03-04');
  });

  it('looks back exactly 14 days on other days', () => {
    expect(resolveDatePartition(undefined, WEDNESDAY)).toBe('2024-03-06');
  });

  it('honours an explicit date partition', () => {
    expect(resolveDatePartition({ date_partition: '2023-12-25' }, WEDNESDAY)).toBe('2023-12-25');
  });

  it('honours weekly mode on any day', () => {
    expect(resolveDatePartition({ mode: 'weekly' }, WEDNESDAY)).toBe('2024-03-04');
  });

  it('honours days_ago, including numeric strings', () => {
    expect(resolveDatePartition({ days_ago: 7 }, WEDNESDAY)).toBe('2024-03-13');
    expect(resolveDatePartition({ days_ago: '1' }, WEDNESDAY)).toBe('2024-03-19');
  });

  it('prefers the test override over the event', () => {
    expect(resolveDatePartition({ date_partition: '2023-12-25' }, WEDNESDAY, '2024-01-01')).toBe(
      '2024-01-01'
    );
  });

  it('ignores unrelated scheduler event fields', () => {
    const scheduled = { source: 'aws.events', 'detail-type': 'Scheduled Event', detail: {} };
    expect(resolveDatePartition(scheduled, MONDAY)).toBe('2024-03-04');
  });

  it('rejects dates that do not exist on the calendar', () => {
    expect(() => resolveDatePartition({ date_partition: '2024-02-30' }, WEDNESDAY)).toThrow(
      'Invalid report configuration: event.date_partition: must be a valid YYYY-MM-DD date'
    );
    expect(() => resolveDatePartition({ date_partition: '2024-13-45' }, WEDNESDAY)).toThrow(
      ConfigurationError
    );
  });

  it('accepts leap days', () => {
    expect(resolveDatePartition({ date_partition: '2024-02-29' }, WEDNESDAY)).toBe('2024-02-29');
  });

  it('treats null overrides as absent', () => {
    expect(resolveDatePartition({ days_ago: null, date_partition: null, mode: null }, WEDNESDAY)).toBe(
      '2024-03-06'
    );
  });

  it('ignores modes other than weekly', () => {
    expect(resolveDatePartition({ mode: 'daily' }, WEDNESDAY)).toBe('2024-03-06');
    expect(resolveDatePartition({ mode: 'daily', days_ago: 2 }, WEDNESDAY)).toBe('2024-03-18');
  });

  it('rejects malformed overrides', () => {
    expect(() => resolveDatePartition({ date_partition: '03/04/2024' }, WEDNESDAY)).toThrow(
      ConfigurationError
    );
    expect(() => resolveDatePartition({ days_ago: -2 }, WEDNESDAY)).toThrow(ConfigurationError);
  });
});
