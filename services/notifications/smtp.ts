import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
}

/** The slice of a nodemailer transporter the channels use. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export const createSmtpTransport = (smtp: SmtpSettings): MailTransport =>
  nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure, // false on 587 upgrades with STARTTLS
    auth: { user: smtp.user, pass: smtp.password },
  });
