/**
 * Format a date as `yyyy-MM-dd HH:mm:ss` in UTC
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  )
}

/**
 * Derive an `org/repo` display name from a clone URL.
 * Handles https and scp-style (`git@host:org/repo.git`) URLs.
 */
export function repoDisplayName(url: string | undefined): string {
  if (!url) return 'Not available'

  const parts = url.split(/[/:]/).filter(part => part.length > 0)
  if (parts.length < 2) return url

  const org = parts[parts.length - 2]
  const repo = parts[parts.length - 1].replace(/\.git$/, '')
  if (!repo) return url

  return `${org}/${repo}`
}

/**
 * Escape text for inclusion in HTML
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/**
 * Keep the last `maxLines` lines of a command's output
 */
export function tailLines(text: string, maxLines: number): string {
  const lines = text.trimEnd().split('\n')
  return lines.slice(-maxLines).join('\n')
}
