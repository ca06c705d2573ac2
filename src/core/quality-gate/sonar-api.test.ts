import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  SonarClient,
  SonarTaskSignal,
  SonarStatusQuery,
  parseReportTask,
  classifyStatusResponse
} from './sonar-api.js'

interface Recorded {
  url: string
  authorization: string | null
}

function fakeFetch(responses: Record<string, unknown[]>, recorded: Recorded[]): typeof fetch {
  return async (input, init) => {
    const url = input instanceof Request ? input.url : String(input)
    const headers = new Headers(init?.headers)
    recorded.push({ url, authorization: headers.get('Authorization') })

    const path = url.replace('http://sonar.test', '')
    const queue = responses[path]
    if (!queue || queue.length === 0) {
      return new Response('not found', { status: 404 })
    }
    const next = queue.length > 1 ? queue.shift() : queue[0]
    return new Response(typeof next === 'string' ? next : JSON.stringify(next), { status: 200 })
  }
}

describe('parseReportTask', () => {
  it('reads key=value lines', () => {
    const values = parseReportTask(
      'projectKey=demo\nserverUrl=http://sonar.test\n# comment\nceTaskId=task-1\nceTaskUrl=http://sonar.test/api/ce/task?id=task-1\n'
    )

    expect(values.projectKey).toBe('demo')
    expect(values.ceTaskId).toBe('task-1')
    expect(values.ceTaskUrl).toBe('http://sonar.test/api/ce/task?id=task-1')
  })
})

describe('classifyStatusResponse', () => {
  it('classifies JSON by the overall project status', () => {
    expect(classifyStatusResponse('{"projectStatus":{"status":"OK","conditions":[]}}')).toBe('OK')
    expect(
      classifyStatusResponse(
        '{"projectStatus":{"status":"ERROR","conditions":[{"status":"OK"}]}}'
      )
    ).toBe('FAILED')
  })

  it('falls back to the marker for bodies that are not JSON', () => {
    expect(classifyStatusResponse('prefix "status":"OK" suffix')).toBe('OK')
    expect(classifyStatusResponse('<html>error</html>')).toBe('FAILED')
  })
})

describe('SonarClient', () => {
  it('sends a bearer token when one is given', async () => {
    const recorded: Recorded[] = []
    const client = new SonarClient({
      baseUrl: 'http://sonar.test/',
      token: 'test-token',
      fetchImpl: fakeFetch({ '/api/ping': ['pong'] }, recorded)
    })

    expect(await client.getText('/api/ping')).toBe('pong')
    expect(recorded[0]).toEqual({ url: 'http://sonar.test/api/ping', authorization: 'Bearer test-token' })
  })

  it('rejects on HTTP errors', async () => {
    const client = new SonarClient({ baseUrl: 'http://sonar.test', fetchImpl: fakeFetch({}, []) })
    await expect(client.getText('/api/missing')).rejects.toThrow('HTTP 404 from /api/missing')
  })
})

describe('SonarTaskSignal', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gate-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('polls the task until it completes, then reads the gate', async () => {
    const reportTaskPath = join(dir, 'report-task.txt')
    await writeFile(reportTaskPath, 'projectKey=demo\nceTaskId=task-1\n')

    const recorded: Recorded[] = []
    const client = new SonarClient({
      baseUrl: 'http://sonar.test',
      fetchImpl: fakeFetch(
        {
          '/api/ce/task?id=task-1': [
            { task: { id: 'task-1', status: 'PENDING' } },
            { task: { id: 'task-1', status: 'IN_PROGRESS' } },
            { task: { id: 'task-1', status: 'SUCCESS', analysisId: 'an-9' } }
          ],
          '/api/qualitygates/project_status?analysisId=an-9': [{ projectStatus: { status: 'OK' } }]
        },
        recorded
      )
    })

    const signal = new SonarTaskSignal({ client, reportTaskPath, pollIntervalMs: 1 })
    const status = await signal.wait(new AbortController().signal)

    expect(status).toBe('OK')
    expect(recorded.map(r => r.url)).toEqual([
      'http://sonar.test/api/ce/task?id=task-1',
      'http://sonar.test/api/ce/task?id=task-1',
      'http://sonar.test/api/ce/task?id=task-1',
      'http://sonar.test/api/qualitygates/project_status?analysisId=an-9'
    ])
  })

  it('rejects when the analysis task fails', async () => {
    const reportTaskPath = join(dir, 'report-task.txt')
    await writeFile(reportTaskPath, 'ceTaskId=task-2\n')

    const client = new SonarClient({
      baseUrl: 'http://sonar.test',
      fetchImpl: fakeFetch(
        { '/api/ce/task?id=task-2': [{ task: { id: 'task-2', status: 'FAILED' } }] },
        []
      )
    })

    const signal = new SonarTaskSignal({ client, reportTaskPath, pollIntervalMs: 1 })
    await expect(signal.wait(new AbortController().signal)).rejects.toThrow(
      'Analysis task task-2 ended with status FAILED'
    )
  })

  it('rejects when the metadata file has no task id', async () => {
    const reportTaskPath = join(dir, 'report-task.txt')
    await writeFile(reportTaskPath, 'projectKey=demo\n')

    const client = new SonarClient({ baseUrl: 'http://sonar.test', fetchImpl: fakeFetch({}, []) })
    const signal = new SonarTaskSignal({ client, reportTaskPath, pollIntervalMs: 1 })

    await expect(signal.wait(new AbortController().signal)).rejects.toThrow('No ceTaskId')
  })
})

describe('SonarStatusQuery', () => {
  it('queries the project status by key', async () => {
    const recorded: Recorded[] = []
    const client = new SonarClient({
      baseUrl: 'http://sonar.test',
      fetchImpl: fakeFetch(
        { '/api/qualitygates/project_status?projectKey=my%20app': ['{"projectStatus":{"status":"OK"}}'] },
        recorded
      )
    })

    const body = await new SonarStatusQuery(client, 'my app').fetchStatus(new AbortController().signal)
    expect(classifyStatusResponse(body)).toBe('OK')
    expect(recorded[0].url).toBe('http://sonar.test/api/qualitygates/project_status?projectKey=my%20app')
  })
})
