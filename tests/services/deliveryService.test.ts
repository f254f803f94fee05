import type { RelayConfig } from '../../src/config/reportConfig';
import { DeliveryError } from '../../src/lib/errors';
import {
  buildOutgoingMail,
  buildSmtpOptions,
  DeliveryService,
  MailTransport,
  OutgoingMail,
} from '../../src/services/deliveryService';
import type { NotificationRecord } from '../../src/types/report';
import { createTestLogger } from '../helpers/testConfig';

const relay: RelayConfig = {
  hosts: ['smtp1.example.com', 'smtp2.example.com'],
  port: 587,
  mode: 'starttls',
};

const notification: NotificationRecord = {
  kind: 'REPORT',
  tenantId: 'tenant=a',
  subject: 'Traffic Weekly Report a',
  body: 'body',
  attachments: [{ filename: 'a.csv', content: Buffer.from('a,b') }],
  recipients: ['one@example.com', 'two@example.com'],
};

interface FakeTransport extends MailTransport {
  sendMail: jest.Mock<Promise<unknown>, [OutgoingMail]>;
  close: jest.Mock<void, []>;
}

function fakeTransport(outcome: Error | 'ok'): FakeTransport {
  return {
    sendMail: jest.fn<Promise<unknown>, [OutgoingMail]>(async () => {
      if (outcome instanceof Error) throw outcome;
      return { messageId: 'id' };
    }),
    close: jest.fn<void, []>(),
  };
}

function createService(hosts: string[], outcomes: Record<string, Error | 'ok'>) {
  const transports = new Map<string, FakeTransport>();
  const factory = jest.fn((host: string) => {
    const transport = fakeTransport(outcomes[host] ?? 'ok');
    transports.set(host, transport);
    return transport;
  });
  const logger = createTestLogger();
  const service = new DeliveryService({ ...relay, hosts }, 'reports@example.com', logger, factory);
  return { service, factory, transports, logger };
}

describe('buildSmtpOptions', () => {
  it('requires STARTTLS in starttls mode', () => {
    expect(buildSmtpOptions('smtp1.example.com', relay)).toEqual({
      host: 'smtp1.example.com',
      port: 587,
      secure: false,
      requireTLS: true,
      ignoreTLS: false,
      connectionTimeout: 30000,
      greetingTimeout: 30000,
      socketTimeout: 30000,
      auth: undefined,
    });
  });

  it('uses implicit TLS in ssl mode and plain text in plain mode', () => {
    expect(buildSmtpOptions('h', { ...relay, mode: 'ssl' })).toMatchObject({
      secure: true,
      requireTLS: false,
      ignoreTLS: false,
    });
    expect(buildSmtpOptions('h', { ...relay, mode: 'plain' })).toMatchObject({
      secure: false,
      requireTLS: false,
      ignoreTLS: true,
    });
  });

  it('authenticates only when a user is configured', () => {
    expect(buildSmtpOptions('h', { ...relay, user: 'relay-user', password: 'test-secret' }).auth).toEqual({
      user: 'relay-user',
      pass: 'test-secret',
    });
  });
});

describe('buildOutgoingMail', () => {
  it('addresses the sender visibly and the recipients in Bcc', () => {
    expect(buildOutgoingMail(notification, 'reports@example.com')).toEqual({
      from: 'reports@example.com',
      to: 'reports@example.com',
      replyTo: 'reports@example.com',
      bcc: ['one@example.com', 'two@example.com'],
      subject: 'Traffic Weekly Report a',
      text: 'body',
      attachments: [{ filename: 'a.csv', content: Buffer.from('a,b'), contentType: 'text/csv' }],
    });
  });
});

describe('DeliveryService', () => {
  it('uses the first host when it accepts the message', async () => {
    const { service, factory, transports } = createService(relay.hosts, {});

    const result = await service.deliver(notification);

    expect(result).toEqual({ success: true, hostUsed: 'smtp1.example.com', errors: [] });
    expect(factory).toHaveBeenCalledTimes(1);
    expect(transports.get('smtp1.example.com')?.close).toHaveBeenCalledTimes(1);
  });

  it('fails over to the second host when the first raises', async () => {
    const { service, transports, logger } = createService(relay.hosts, {
      'smtp1.example.com': new Error('Connection timeout'),
    });

    const result = await service.deliver(notification);

    expect(result).toEqual({
      success: true,
      hostUsed: 'smtp2.example.com',
      errors: ['smtp1.example.com failed: Connection timeout'],
    });
    expect(transports.get('smtp1.example.com')?.close).toHaveBeenCalledTimes(1);
    expect(transports.get('smtp2.example.com')?.sendMail).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('SMTP host failed', expect.any(Error), {
      host: 'smtp1.example.com',
      kind: 'REPORT',
      tenantId: 'tenant=a',
    });
  });

  it('skips empty host entries', async () => {
    const { service, factory } = createService(['', 'smtp2.example.com'], {});

    const result = await service.deliver(notification);

    expect(result.hostUsed).toBe('smtp2.example.com');
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('throws DeliveryError when every host fails', async () => {
    const { service } = createService(relay.hosts, {
      'smtp1.example.com': new Error('refused'),
      'smtp2.example.com': new Error('timeout'),
    });

    const error = await service.deliver(notification).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({
      subject: 'Traffic Weekly Report a',
      errors: ['smtp1.example.com failed: refused', 'smtp2.example.com failed: timeout'],
    });
  });
});
