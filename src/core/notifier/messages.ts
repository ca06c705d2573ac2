import { escapeHtml, repoDisplayName } from '../../utils/format.js'
import type { MailMessage } from './mailer.js'
import type { PipelineStatus, QualityGateStatus } from '../../types/index.js'

export type StatusClass = 'success' | 'warning' | 'failure'

export function buildStatusClass(status: PipelineStatus): StatusClass {
  return status === 'SUCCESS' ? 'success' : 'failure'
}

export function gateStatusClass(status: QualityGateStatus): StatusClass {
  if (status === 'OK') return 'success'
  if (status === 'NOT_RUN') return 'warning'
  return 'failure'
}

export function gateStatusLabel(status: QualityGateStatus): string {
  return status === 'NOT_RUN' ? 'Not Run' : status
}

export interface DependencyScanMessageInput {
  status: PipelineStatus
  projectName?: string
  reportUrl: string
  errorMessage?: string
  /** Report file attached to the message, when one was written */
  attachment?: { filename: string; path: string }
}

/**
 * Plain-text result message for the dependency scan
 */
export function renderDependencyScanMessage(input: DependencyScanMessageInput): MailMessage {
  const lines: string[] = input.projectName ? [`Project: ${input.projectName}`] : []
  lines.push(`Python dependency scan completed with result: ${input.status}`)
  if (input.errorMessage) {
    lines.push('', `Error: ${input.errorMessage}`)
  }
  lines.push('', `See the report for details: ${input.reportUrl}`)

  return {
    subject: `Python Dependency Scan Results - ${input.status}`,
    text: lines.join('\n'),
    attachments: input.attachment ? [input.attachment] : []
  }
}

export interface StaticAnalysisMessageInput {
  projectName: string
  repositoryUrl?: string
  buildStatus: PipelineStatus
  gateStatus: QualityGateStatus
  timestamp: string
  buildUrl?: string
  dashboardUrl?: string
  errorMessage?: string
}

const STYLE = `body { font-family: Arial, sans-serif; }
.header { background-color: #f2f2f2; padding: 10px; border-bottom: 1px solid #ddd; }
.success { color: green; }
.failure { color: red; }
.warning { color: orange; }
.container { padding: 15px; }
table { border-collapse: collapse; width: 100%; }
table, th, td { border: 1px solid #ddd; }
th, td { padding: 8px; text-align: left; }
th { background-color: #f2f2f2; }`

function row(label: string, cell: string, className?: string): string {
  const classAttr = className ? ` class="${className}"` : ''
  return `<tr><th>${escapeHtml(label)}</th><td${classAttr}>${cell}</td></tr>`
}

function link(url: string | undefined, text?: string): string {
  if (!url) return 'Not available'
  return `<a href="${escapeHtml(url)}">${escapeHtml(text ?? url)}</a>`
}

/**
 * HTML status table for the static-analysis pipeline
 */
export function renderStaticAnalysisMessage(input: StaticAnalysisMessageInput): MailMessage {
  const rows = [
    row('Project', escapeHtml(input.projectName)),
    row('Repository', link(input.repositoryUrl, repoDisplayName(input.repositoryUrl))),
    row('Build Status', escapeHtml(input.buildStatus), buildStatusClass(input.buildStatus)),
    row(
      'Quality Gate Status',
      escapeHtml(gateStatusLabel(input.gateStatus)),
      gateStatusClass(input.gateStatus)
    ),
    row('Date & Time (UTC)', escapeHtml(input.timestamp)),
    row('Build URL', link(input.buildUrl)),
    row('SonarQube Report', link(input.dashboardUrl, 'View Detailed Report'))
  ]
  if (input.errorMessage) {
    rows.push(row('Error', escapeHtml(input.errorMessage), 'failure'))
  }

  const html = [
    '<html>',
    `<head><style>\n${STYLE}\n</style></head>`,
    '<body>',
    '<div class="header"><h1>SonarQube Analysis Results</h1></div>',
    '<div class="container">',
    '<table>',
    ...rows,
    '</table>',
    '</div>',
    '</body>',
    '</html>'
  ].join('\n')

  return {
    subject: `${input.buildStatus}: SonarQube Analysis for ${input.projectName}`,
    html
  }
}
