/**
 * Ticket Renderer
 *
 * Turns an index number into a QR code and mails it to the subject as an
 * inline image inside the invitation email.
 */

import QRCode from "qrcode";
import type { SendTicket } from "@/modules/registry/registry.types";
import type { Mailer } from "./email";
import { createLogger } from "./logger";

const logger = createLogger("tickets");

export const QR_CONTENT_ID = "ticket-qr";

export interface EventDetails {
  name: string;
  date?: string;
  venue?: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// QR code for an index number as PNG bytes, error correction level H
export function renderTicketQr(indexKey: string): Promise<Buffer> {
  return QRCode.toBuffer(indexKey, {
    type: "png",
    errorCorrectionLevel: "H",
    margin: 4,
    scale: 10,
    color: {
      dark: "#1a365dff",
      light: "#ffffffff",
    },
  });
}

export function renderInvitationEmail(input: {
  displayName: string;
  indexKey: string;
  event: EventDetails;
}): { subject: string; html: string } {
  const name = escapeHtml(input.displayName);
  const indexKey = escapeHtml(input.indexKey);
  const eventName = escapeHtml(input.event.name);

  const details = [
    input.event.date ? `<p><strong>Date:</strong> ${escapeHtml(input.event.date)}</p>` : "",
    input.event.venue ? `<p><strong>Venue:</strong> ${escapeHtml(input.event.venue)}</p>` : "",
  ].join("");

  return {
    subject: `Your invitation to ${input.event.name}`,
    html: `
      <h2>You're registered for ${eventName}!</h2>
      <p>Dear ${name},</p>
      <p>Thank you for registering. Your index number is <strong>${indexKey}</strong>.</p>
      ${details}
      <p>Show this QR code at the entrance to check in:</p>
      <p><img src="cid:${QR_CONTENT_ID}" alt="QR code for ${indexKey}" width="250" height="250" /></p>
      <p>Please keep this email; the code can only be used to check in once.</p>
    `,
  };
}

export interface TicketSenderOptions {
  mailer: Mailer;
  event: EventDetails;
}

export function createTicketSender(options: TicketSenderOptions): SendTicket {
  const { mailer, event } = options;

  return async (contactAddress, displayName, indexKey) => {
    let qr: Buffer;
    try {
      qr = await renderTicketQr(indexKey);
    } catch (error) {
      logger.error({ err: error, indexKey }, "QR code generation failed");
      return false;
    }

    const { subject, html } = renderInvitationEmail({ displayName, indexKey, event });

    return mailer.sendEmail({
      to: contactAddress,
      subject,
      html,
      attachments: [
        {
          filename: `ticket-${indexKey}.png`,
          content: qr,
          contentType: "image/png",
          cid: QR_CONTENT_ID,
        },
      ],
    });
  };
}
