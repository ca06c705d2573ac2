import { SmtpMailer, type Mailer } from '../core/notifier/mailer.js'
import type { HostContext } from '../types/index.js'

/**
 * CI host state from the process environment
 */
export function hostContextFromEnv(env: NodeJS.ProcessEnv = process.env): HostContext {
  return {
    buildUrl: env.BUILD_URL || undefined,
    gitUrl: env.GIT_URL || undefined,
    sonarToken: env.SONAR_TOKEN || undefined,
    now: () => new Date()
  }
}

/**
 * SMTP relay from `SMTP_HOST`, `SMTP_PORT`, `SMTP_SECURE` and `SMTP_FROM`.
 * Without `SMTP_HOST` notifications are skipped.
 */
export function mailerFromEnv(env: NodeJS.ProcessEnv = process.env): Mailer | undefined {
  if (!env.SMTP_HOST) return undefined

  const port = env.SMTP_PORT ? Number.parseInt(env.SMTP_PORT, 10) : undefined
  return new SmtpMailer({
    host: env.SMTP_HOST,
    port: port !== undefined && !Number.isNaN(port) ? port : undefined,
    secure: env.SMTP_SECURE === 'true',
    from: env.SMTP_FROM || 'scanrelay@localhost'
  })
}
