/**
 * Delivery Service
 *
 * Sends a composed notification through the configured SMTP relays in order,
 * stopping at the first host that accepts it. Each host is tried once.
 * The sender is the visible recipient; the actual recipients go in Bcc.
 */

import * as nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { RelayConfig } from '../config/reportConfig';
import { DeliveryError } from '../lib/errors';
import type { ReportLogger } from '../lib/logger';
import type { DeliveryResult, NotificationRecord } from '../types/report';

const SMTP_TIMEOUT_MS = 30_000;
const ATTACHMENT_CONTENT_TYPE = 'text/csv';

export interface OutgoingMail {
  from: string;
  to: string;
  replyTo: string;
  bcc: string[];
  subject: string;
  text: string;
  attachments: Array<{ filename: string; content: Buffer; contentType: string }>;
}

export interface MailTransport {
  sendMail(mail: OutgoingMail): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (host: string, relay: RelayConfig) => MailTransport;

export function buildSmtpOptions(host: string, relay: RelayConfig): SMTPTransport.Options {
  return {
    host,
    port: relay.port,
    secure: relay.mode === 'ssl',
    requireTLS: relay.mode === 'starttls',
    ignoreTLS: relay.mode === 'plain',
    connectionTimeout: SMTP_TIMEOUT_MS,
    greetingTimeout: SMTP_TIMEOUT_MS,
    socketTimeout: SMTP_TIMEOUT_MS,
    auth: relay.user ? { user: relay.user, pass: relay.password ?? '' } : undefined,
  };
}

/**
 * One nodemailer SMTP transport per relay host
 */
export const createSmtpTransport: TransportFactory = (host, relay) => {
  const transporter = nodemailer.createTransport(buildSmtpOptions(host, relay));
  return {
    sendMail: (mail) => transporter.sendMail(mail),
    close: () => transporter.close(),
  };
};

export function buildOutgoingMail(notification: NotificationRecord, sender: string): OutgoingMail {
  return {
    from: sender,
    to: sender,
    replyTo: sender,
    bcc: [...notification.recipients],
    subject: notification.subject,
    text: notification.body,
    attachments: notification.attachments.map((attachment) => ({
      filename: attachment.filename,
      content: attachment.content,
      contentType: ATTACHMENT_CONTENT_TYPE,
    })),
  };
}

export class DeliveryService {
  constructor(
    private readonly relay: RelayConfig,
    private readonly sender: string,
    private readonly logger: ReportLogger,
    private readonly createTransport: TransportFactory = createSmtpTransport
  ) {}

  /**
   * @throws DeliveryError when every configured host fails
   */
  async deliver(notification: NotificationRecord): Promise<DeliveryResult> {
    const mail = buildOutgoingMail(notification, this.sender);
    const errors: string[] = [];

    for (const host of this.relay.hosts) {
      if (!host) continue;

      const transport = this.createTransport(host, this.relay);
      try {
        await transport.sendMail(mail);
        this.logger.info('Email sent', { host, kind: notification.kind, tenantId: notification.tenantId });
        return { success: true, hostUsed: host, errors };
      } catch (error) {
        const message = `${host} failed: ${error instanceof Error ? error.message : String(error)}`;
        this.logger.error('SMTP host failed', error instanceof Error ? error : undefined, {
          host,
          kind: notification.kind,
          tenantId: notification.tenantId,
        });
        errors.push(message);
      } finally {
        transport.close();
      }
    }

    throw new DeliveryError(notification.subject, errors);
  }
}
