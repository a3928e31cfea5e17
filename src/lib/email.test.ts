import { describe, expect, it, vi } from "vitest";
import { createMailer } from "./email";

const { createTransport, sendMail } = vi.hoisted(() => {
  const sendMail = vi.fn();
  return { sendMail, createTransport: vi.fn(() => ({ sendMail })) };
});

vi.mock("nodemailer", () => ({
  default: { createTransport },
}));

describe("createMailer", () => {
  it("should not build a transport without an SMTP host", async () => {
    const mailer = createMailer({ port: 587, from: "FestPass <noreply@example.com>" });

    const sent = await mailer.sendEmail({ to: "nimal@example.com", subject: "Hi", html: "<p>Hi</p>" });

    expect(sent).toBe(false);
    expect(createTransport).not.toHaveBeenCalled();
  });

  it("should pass credentials to the transport", () => {
    createMailer({
      host: "smtp.example.com",
      port: 465,
      secure: true,
      user: "mailer",
      pass: "test-secret",
      from: "FestPass <noreply@example.com>",
    });

    expect(createTransport).toHaveBeenCalledWith({
      host: "smtp.example.com",
      port: 465,
      secure: true,
      auth: { user: "mailer", pass: "test-secret" },
    });
  });

  it("should send with the configured sender", async () => {
    sendMail.mockResolvedValue({ messageId: "<1@example.com>" });
    const mailer = createMailer({
      host: "smtp.example.com",
      port: 587,
      from: "FestPass <noreply@example.com>",
    });
    const attachments = [
      { filename: "ticket.png", content: Buffer.from("png"), contentType: "image/png", cid: "qr" },
    ];

    const sent = await mailer.sendEmail({
      to: "nimal@example.com",
      subject: "Your invitation",
      html: "<p>Hi</p>",
      attachments,
    });

    expect(sent).toBe(true);
    expect(sendMail).toHaveBeenCalledWith({
      from: "FestPass <noreply@example.com>",
      to: "nimal@example.com",
      subject: "Your invitation",
      html: "<p>Hi</p>",
      attachments,
    });
  });

  it("should return false when sending fails", async () => {
    sendMail.mockRejectedValue(new Error("550 mailbox unavailable"));
    const mailer = createMailer({ host: "smtp.example.com", port: 587, from: "noreply@example.com" });

    await expect(
      mailer.sendEmail({ to: "nimal@example.com", subject: "Hi", html: "<p>Hi</p>" }),
    ).resolves.toBe(false);
  });
});
