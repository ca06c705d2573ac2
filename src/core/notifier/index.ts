export { NotificationDispatcher, type NotificationDispatcherOptions } from './dispatcher.js'
export {
  SmtpMailer,
  type Mailer,
  type MailMessage,
  type MailAttachment,
  type SmtpMailerOptions
} from './mailer.js'
export {
  renderDependencyScanMessage,
  renderStaticAnalysisMessage,
  buildStatusClass,
  gateStatusClass,
  gateStatusLabel,
  type StatusClass,
  type DependencyScanMessageInput,
  type StaticAnalysisMessageInput
} from './messages.js'
