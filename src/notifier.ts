import nodemailer, { type Transporter } from 'nodemailer';
import { loadMailConfig, type MailConfig } from './config.js';
import { createLogger } from './logger.js';

const logger = createLogger('notifier');

export const DEFAULT_SUBJECT = 'Daily Analytics Digest';

export type MailTransport = {
    sendMail(message: { from: string; to: string[]; subject: string; text: string }): Promise<unknown>;
};

export type TransportFactory = (cfg: MailConfig) => MailTransport;

/** SMTP with STARTTLS required and password auth. */
export function createSmtpTransport(cfg: MailConfig): Transporter {
    return nodemailer.createTransport({
        host: cfg.host,
        port: cfg.port,
        secure: false,
        requireTLS: true,
        auth: { user: cfg.user, pass: cfg.pass },
    });
}

export type SendOptions = {
    env?: NodeJS.ProcessEnv;
    subject?: string;
    createTransport?: TransportFactory;
};

/**
 * Sends the text digest as one plain-text message.
 * Mail settings are validated before any transport exists; send errors propagate.
 */
export async function sendDigestEmail(text: string, opts: SendOptions = {}): Promise<void> {
    const cfg = loadMailConfig(opts.env ?? process.env);
    const transport = (opts.createTransport ?? createSmtpTransport)(cfg);
    await transport.sendMail({ from: cfg.from, to: cfg.to, subject: opts.subject ?? DEFAULT_SUBJECT, text });
    logger.info('mail.sent', { host: cfg.host, recipients: cfg.to.length });
}
