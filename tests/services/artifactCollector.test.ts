import {
  ArtifactCollector,
  decodeFragmentText,
  toFragmentPrefix,
} from '../../src/services/artifactCollector';
import { StorageError } from '../../src/lib/errors';
import { InMemoryObjectStore } from '../helpers/inMemoryObjectStore';
import {
  ATTACHMENT_ROOT,
  buildTestConfig,
  createTestLogger,
  FRAGMENT_ROOT,
  leafKey,
  TEST_BUCKET,
} from '../helpers/testConfig';

const tenant = { id: 'tenant=a', displayName: 'a' };
const leafPrefix = (root: string, channel: string, ipv: string, ipField: string) =>
  leafKey(root, 'tenant=a', channel, ipv, ipField, '');

describe('decodeFragmentText', () => {
  it('normalises line endings and trims', () => {
    expect(decodeFragmentText(Buffer.from('  line one\r\nline two\rline three\n\n'))).toBe(
      'line one\nline two\nline three'
    );
  });

  it('replaces invalid UTF-8 sequences', () => {
    expect(decodeFragmentText(Buffer.from([0x6f, 0x6b, 0xff]))).toBe('ok\uFFFD');
  });
});

describe('toFragmentPrefix', () => {
  const { storage } = buildTestConfig();

  it('swaps the attachment root for the fragment root', () => {
    expect(toFragmentPrefix(`${ATTACHMENT_ROOT}tenant=a/web/`, storage)).toBe(
      `${FRAGMENT_ROOT}tenant=a/web/`
    );
  });

  it('leaves other prefixes alone', () => {
    expect(toFragmentPrefix('elsewhere/tenant=a/', storage)).toBe('elsewhere/tenant=a/');
  });
});

describe('ArtifactCollector', () => {
  const { storage } = buildTestConfig();

  it('collects attachments byte-for-byte and fragments with tenant-relative labels', async () => {
    const csv = Buffer.from([0xef, 0xbb, 0xbf, 0x61, 0x2c, 0x62, 0x0d, 0x0a]);
    const store = new InMemoryObjectStore()
      .put(TEST_BUCKET, leafKey(ATTACHMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'DIPS_top.csv'), csv)
      .put(TEST_BUCKET, leafKey(ATTACHMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'notes.md'), 'skip')
      .put(TEST_BUCKET, leafKey(FRAGMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'DIPS.txt'), 'hello\r\n');
    const collector = new ArtifactCollector(store, storage, createTestLogger());

    const collected = await collector.collect(tenant, [leafPrefix(ATTACHMENT_ROOT, 'web', '4', 'dst')]);

    expect(collected.attachments).toEqual([{ filename: 'DIPS_top.csv', content: csv }]);
    expect(collected.fragments).toEqual([
      {
        label: 'web/ipv=4/ip_field=dst/cadence=week/date-partition=2024-03-04/DIPS.txt',
        content: 'hello',
      },
    ]);
  });

  it('keeps leaf order, then listing order inside each leaf', async () => {
    const store = new InMemoryObjectStore()
      .put(TEST_BUCKET, leafKey(FRAGMENT_ROOT, 'tenant=a', 'web', '6', 'src', 'b.txt'), 'third')
      .put(TEST_BUCKET, leafKey(FRAGMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'b.txt'), 'second')
      .put(TEST_BUCKET, leafKey(FRAGMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'a.txt'), 'first');
    const collector = new ArtifactCollector(store, storage, createTestLogger());

    const collected = await collector.collect(tenant, [
      leafPrefix(ATTACHMENT_ROOT, 'web', '4', 'dst'),
      leafPrefix(ATTACHMENT_ROOT, 'web', '6', 'src'),
    ]);

    expect(collected.attachments).toEqual([]);
    expect(collected.fragments.map((fragment) => fragment.content)).toEqual([
      'first',
      'second',
      'third',
    ]);
  });

  it('drops fragments that are empty after trimming', async () => {
    const logger = createTestLogger();
    const emptyKey = leafKey(FRAGMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'blank.txt');
    const store = new InMemoryObjectStore().put(TEST_BUCKET, emptyKey, ' \r\n\t');
    const collector = new ArtifactCollector(store, storage, logger);

    const collected = await collector.collect(tenant, [leafPrefix(ATTACHMENT_ROOT, 'web', '4', 'dst')]);

    expect(collected.fragments).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith('Skipping empty summary fragment', {
      tenantId: 'tenant=a',
      key: emptyKey,
    });
  });

  it('returns nothing for a tenant without leaves', async () => {
    const collector = new ArtifactCollector(new InMemoryObjectStore(), storage, createTestLogger());

    await expect(collector.collect(tenant, [])).resolves.toEqual({ attachments: [], fragments: [] });
  });

  it('propagates fetch failures', async () => {
    const key = leafKey(ATTACHMENT_ROOT, 'tenant=a', 'web', '4', 'dst', 'x.csv');
    const store = new InMemoryObjectStore().put(TEST_BUCKET, key, 'x').failWhen('getObject', key);
    const collector = new ArtifactCollector(store, storage, createTestLogger());

    await expect(
      collector.collect(tenant, [leafPrefix(ATTACHMENT_ROOT, 'web', '4', 'dst')])
    ).rejects.toBeInstanceOf(StorageError);
  });
});
