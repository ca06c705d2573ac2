import { describe, it, expect } from 'vitest'
import {
  renderDependencyScanMessage,
  renderStaticAnalysisMessage,
  gateStatusClass,
  buildStatusClass
} from './messages.js'

describe('renderDependencyScanMessage', () => {
  it('renders a plain-text result with the report attached', () => {
    const message = renderDependencyScanMessage({
      status: 'SUCCESS',
      reportUrl: 'https://ci.test/job/1/artifact/report.txt',
      attachment: { filename: 'report.txt', path: '/work/report.txt' }
    })

    expect(message.subject).toBe('Python Dependency Scan Results - SUCCESS')
    expect(message.text).toBe(
      'Python dependency scan completed with result: SUCCESS\n\n' +
        'See the report for details: https://ci.test/job/1/artifact/report.txt'
    )
    expect(message.html).toBeUndefined()
    expect(message.attachments).toEqual([{ filename: 'report.txt', path: '/work/report.txt' }])
  })

  it('includes the error message on failure', () => {
    const message = renderDependencyScanMessage({
      status: 'FAILURE',
      reportUrl: '/work/artifacts/report.txt',
      errorMessage: "Tool 'pip-audit' is not available at venv/bin/pip-audit: ENOENT"
    })

    expect(message.subject).toBe('Python Dependency Scan Results - FAILURE')
    expect(message.text).toBe(
      'Python dependency scan completed with result: FAILURE\n\n' +
        "Error: Tool 'pip-audit' is not available at venv/bin/pip-audit: ENOENT\n\n" +
        'See the report for details: /work/artifacts/report.txt'
    )
    expect(message.attachments).toEqual([])
  })

  it('names the project above the result line', () => {
    const message = renderDependencyScanMessage({
      status: 'SUCCESS',
      projectName: 'Billing API',
      reportUrl: '/work/artifacts/report.txt'
    })

    expect(message.subject).toBe('Python Dependency Scan Results - SUCCESS')
    expect(message.text).toBe(
      'Project: Billing API\n' +
        'Python dependency scan completed with result: SUCCESS\n\n' +
        'See the report for details: /work/artifacts/report.txt'
    )
  })
})

describe('status classes', () => {
  it('maps gate statuses', () => {
    expect(gateStatusClass('OK')).toBe('success')
    expect(gateStatusClass('NOT_RUN')).toBe('warning')
    expect(gateStatusClass('FAILED')).toBe('failure')
    expect(gateStatusClass('ERROR')).toBe('failure')
    expect(gateStatusClass('TIMEOUT')).toBe('failure')
  })

  it('maps build statuses', () => {
    expect(buildStatusClass('SUCCESS')).toBe('success')
    expect(buildStatusClass('FAILURE')).toBe('failure')
  })
})

describe('renderStaticAnalysisMessage', () => {
  const base = {
    projectName: 'demo-app',
    repositoryUrl: 'https://git.example.com/acme/demo-app.git',
    buildStatus: 'SUCCESS' as const,
    gateStatus: 'OK' as const,
    timestamp: '2024-03-01 12:00:00',
    buildUrl: 'https://ci.test/job/7/',
    dashboardUrl: 'http://sonar.test/dashboard?id=demo-app'
  }

  it('renders the status table', () => {
    const message = renderStaticAnalysisMessage(base)

    expect(message.subject).toBe('SUCCESS: SonarQube Analysis for demo-app')
    expect(message.text).toBeUndefined()
    expect(message.html).toContain('<tr><th>Project</th><td>demo-app</td></tr>')
    expect(message.html).toContain(
      '<tr><th>Repository</th><td><a href="https://git.example.com/acme/demo-app.git">acme/demo-app</a></td></tr>'
    )
    expect(message.html).toContain('<tr><th>Build Status</th><td class="success">SUCCESS</td></tr>')
    expect(message.html).toContain(
      '<tr><th>Quality Gate Status</th><td class="success">OK</td></tr>'
    )
    expect(message.html).toContain('<tr><th>Date &amp; Time (UTC)</th><td>2024-03-01 12:00:00</td></tr>')
    expect(message.html).toContain(
      '<tr><th>SonarQube Report</th><td><a href="http://sonar.test/dashboard?id=demo-app">View Detailed Report</a></td></tr>'
    )
  })

  it('marks a gate that was not run as a warning', () => {
    const message = renderStaticAnalysisMessage({ ...base, gateStatus: 'NOT_RUN' })
    expect(message.html).toContain(
      '<tr><th>Quality Gate Status</th><td class="warning">Not Run</td></tr>'
    )
  })

  it('escapes values and shows missing links as not available', () => {
    const message = renderStaticAnalysisMessage({
      ...base,
      projectName: '<b>demo</b>',
      buildStatus: 'FAILURE',
      gateStatus: 'TIMEOUT',
      repositoryUrl: undefined,
      buildUrl: undefined,
      dashboardUrl: undefined,
      errorMessage: 'sonar-scanner exited with status 2'
    })

    expect(message.subject).toBe('FAILURE: SonarQube Analysis for <b>demo</b>')
    expect(message.html).toContain('<tr><th>Project</th><td>&lt;b&gt;demo&lt;/b&gt;</td></tr>')
    expect(message.html).toContain('<tr><th>Repository</th><td>Not available</td></tr>')
    expect(message.html).toContain('<tr><th>Build URL</th><td>Not available</td></tr>')
    expect(message.html).toContain(
      '<tr><th>Quality Gate Status</th><td class="failure">TIMEOUT</td></tr>'
    )
    expect(message.html).toContain(
      '<tr><th>Error</th><td class="failure">sonar-scanner exited with status 2</td></tr>'
    )
  })
})
