import nodemailer, { type Transporter } from "nodemailer";
import { createLogger } from "./logger";

const logger = createLogger("email");

export interface MailerOptions {
  host?: string;
  port: number;
  secure?: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
  // Content id for inline images referenced as cid:<id>
  cid?: string;
}

export interface EmailData {
  to: string;
  subject: string;
  html: string;
  attachments?: EmailAttachment[];
}

export interface Mailer {
  sendEmail(data: EmailData): Promise<boolean>;
}

// Build an SMTP transporter, or null when SMTP is not configured
function createTransporter(options: MailerOptions): Transporter | null {
  if (!options.host) {
    logger.warn("SMTP not configured - emails will be logged only");
    return null;
  }

  return nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.secure,
    auth:
      options.user && options.pass
        ? {
            user: options.user,
            pass: options.pass,
          }
        : undefined,
  });
}

export function createMailer(options: MailerOptions): Mailer {
  const transport = createTransporter(options);

  return {
    async sendEmail(data: EmailData): Promise<boolean> {
      if (!transport) {
        logger.debug({ to: data.to, subject: data.subject }, "Would send email");
        return false;
      }

      try {
        const result = await transport.sendMail({
          from: options.from,
          to: data.to,
          subject: data.subject,
          html: data.html,
          attachments: data.attachments,
        });

        logger.info({ to: data.to, subject: data.subject, messageId: result.messageId }, "Email sent");
        return true;
      } catch (error) {
        logger.error({ err: error, to: data.to }, "Email send error");
        return false;
      }
    },
  };
}
