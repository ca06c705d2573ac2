import type { ReportSection } from '../../types/index.js'

/**
 * Append-only, ordered report buffer. Sealing makes it read-only.
 */
export class ScanReport {
  private readonly entries: ReportSection[] = []
  private sealed = false

  append(title: string, body: string): void {
    if (this.sealed) {
      throw new Error(`Cannot append '${title}' to a sealed report`)
    }
    this.entries.push(Object.freeze({ title, body }))
  }

  appendAll(sections: readonly ReportSection[]): void {
    for (const section of sections) {
      this.append(section.title, section.body)
    }
  }

  seal(): this {
    this.sealed = true
    return this
  }

  get isSealed(): boolean {
    return this.sealed
  }

  get sections(): readonly ReportSection[] {
    return [...this.entries]
  }

  get titles(): string[] {
    return this.entries.map(section => section.title)
  }

  get isEmpty(): boolean {
    return this.entries.length === 0
  }

  /**
   * All section bodies joined by newlines
   */
  bodyText(): string {
    return this.entries.map(section => section.body).join('\n')
  }

  /**
   * Plain-text rendering: the first section is the underlined report
   * heading, the rest are `## TITLE ##` blocks separated by blank lines
   */
  render(): string {
    const blocks = this.entries.map((section, index) => {
      const body = section.body.replace(/\n+$/, '')
      const heading = index === 0
        ? `${section.title}\n${'='.repeat(section.title.length)}`
        : `## ${section.title} ##`
      return body ? `${heading}\n${body}` : heading
    })
    return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : ''
  }
}

/**
 * A run stopped on an unrecoverable error. Carries the sections produced
 * before the abort so they can still be written and archived.
 */
export class ScanAbortedError extends Error {
  constructor(
    message: string,
    public readonly partialReport: ScanReport,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ScanAbortedError'
  }
}
