import nodemailer from 'nodemailer'
import type { Transporter } from 'nodemailer'

export interface MailAttachment {
  filename: string
  path: string
}

/**
 * Rendered notification, independent of the transport
 */
export interface MailMessage {
  subject: string
  text?: string
  html?: string
  attachments?: MailAttachment[]
}

/**
 * Mail transport collaborator
 */
export interface Mailer {
  send(message: MailMessage, recipients: readonly string[]): Promise<void>
}

export interface SmtpMailerOptions {
  host: string
  port?: number
  secure?: boolean
  from: string
}

/**
 * Mailer backed by an SMTP relay
 */
export class SmtpMailer implements Mailer {
  private readonly transport: Transporter
  private readonly from: string

  constructor(options: SmtpMailerOptions) {
    this.from = options.from
    this.transport = nodemailer.createTransport({
      host: options.host,
      port: options.port ?? 25,
      secure: options.secure ?? false
    })
  }

  async send(message: MailMessage, recipients: readonly string[]): Promise<void> {
    await this.transport.sendMail({
      from: this.from,
      to: recipients.join(', '),
      subject: message.subject,
      text: message.text,
      html: message.html,
      attachments: message.attachments
    })
  }
}
