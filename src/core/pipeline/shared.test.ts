import { describe, it, expect } from 'vitest'
import { normalizedBuildUrl, repositoryFor } from './shared.js'

const now = () => new Date(0)

describe('normalizedBuildUrl', () => {
  it('appends a missing trailing slash', () => {
    expect(normalizedBuildUrl({ buildUrl: 'https://ci.test/job/1', now })).toBe('https://ci.test/job/1/')
    expect(normalizedBuildUrl({ buildUrl: 'https://ci.test/job/1/', now })).toBe('https://ci.test/job/1/')
    expect(normalizedBuildUrl({ now })).toBeUndefined()
  })
})

describe('repositoryFor', () => {
  it('prefers configuration, then the host, then the checkout', () => {
    const host = { gitUrl: 'https://git.example.com/acme/host.git', now }
    expect(repositoryFor('https://git.example.com/acme/conf.git', host, 'origin')).toBe(
      'https://git.example.com/acme/conf.git'
    )
    expect(repositoryFor('', host, 'origin')).toBe('https://git.example.com/acme/host.git')
    expect(repositoryFor('', { now }, 'https://git.example.com/acme/origin.git')).toBe(
      'https://git.example.com/acme/origin.git'
    )
    expect(repositoryFor('', { now })).toBe('Not available')
  })
})
