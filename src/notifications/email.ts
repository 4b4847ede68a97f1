import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import type { SmtpSettings } from "../config.js";
import * as log from "../log.js";

export interface EmailSender {
  /** Resolves false when delivery failed; never rejects. */
  send(to: string, subject: string, html: string): Promise<boolean>;
}

export function smtpTransportOptions(smtp: SmtpSettings): SMTPTransport.Options {
  const options: SMTPTransport.Options = {
    host: smtp.host,
    port: smtp.port,
    secure: false,
    requireTLS: smtp.useTls,
    ignoreTLS: !smtp.useTls,
  };
  if (smtp.username && smtp.password) {
    options.auth = { user: smtp.username, pass: smtp.password };
  }
  return options;
}

export function createSmtpSender(smtp: SmtpSettings): EmailSender {
  const transport = nodemailer.createTransport(smtpTransportOptions(smtp));

  return {
    async send(to, subject, html) {
      try {
        await transport.sendMail({ from: smtp.fromEmail, to, subject, html });
        log.success(`Email sent successfully to ${to}`);
        return true;
      } catch (err: unknown) {
        log.error(`Failed to send email to ${to}: ${log.errorMessage(err)}`);
        return false;
      }
    },
  };
}
