import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { Mailer, MailMessage } from './mailer.js'

export interface NotificationDispatcherOptions {
  /** Without a mailer every notification is skipped */
  mailer?: Mailer
  logger?: Logger
}

/**
 * Hands rendered messages to the mail collaborator. Delivery problems are
 * logged and never change the pipeline result.
 */
export class NotificationDispatcher {
  private readonly mailer?: Mailer
  private readonly logger: Logger

  constructor(options: NotificationDispatcherOptions = {}) {
    this.mailer = options.mailer
    this.logger = options.logger ?? createLogger('notifier')
  }

  /**
   * Send `message` to `recipients`. Resolves to whether it was delivered.
   */
  async notify(message: MailMessage, recipients: readonly string[]): Promise<boolean> {
    if (recipients.length === 0) {
      this.logger.debug('No recipients configured, skipping notification')
      return false
    }
    if (!this.mailer) {
      this.logger.warn(`No mail transport configured, not notifying ${recipients.join(', ')}`)
      return false
    }

    try {
      await this.mailer.send(message, recipients)
      this.logger.info(`Notification sent to ${recipients.join(', ')}`)
      return true
    } catch (error) {
      this.logger.error(`Failed to send notification: ${errorMessage(error)}`)
      return false
    }
  }
}
