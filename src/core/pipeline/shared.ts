import { UNKNOWN_REPOSITORY } from '../workspace/git.js'
import type { HostContext } from '../../types/index.js'

/**
 * Build page URL with a trailing slash, when the host provides one
 */
export function normalizedBuildUrl(host: HostContext): string | undefined {
  if (!host.buildUrl) return undefined
  return host.buildUrl.endsWith('/') ? host.buildUrl : `${host.buildUrl}/`
}

/**
 * Repository shown in reports: configured URL, then the host's, then the checkout's origin
 */
export function repositoryFor(configured: string, host: HostContext, origin?: string): string {
  return configured || host.gitUrl || origin || UNKNOWN_REPOSITORY
}
