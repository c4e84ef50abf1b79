import { describe, it, expect } from 'vitest'
import { errorMeta, loggerSettings, makeLogger } from '../src/index.js'

describe('loggerSettings', () => {
  it('pretty prints at info level in development', () => {
    expect(loggerSettings({})).toEqual({ level: 'info', pretty: true })
  })

  it('writes plain JSON in production and test', () => {
    expect(loggerSettings({ NODE_ENV: 'production', LOG_LEVEL: 'warn' })).toEqual({
      level: 'warn',
      pretty: false,
    })
    expect(loggerSettings({ NODE_ENV: 'test', LOG_LEVEL: 'silent' })).toEqual({
      level: 'silent',
      pretty: false,
    })
  })

  it('falls back to info for an unknown level', () => {
    expect(loggerSettings({ NODE_ENV: 'test', LOG_LEVEL: 'loud' }).level).toBe('info')
  })
})

describe('errorMeta', () => {
  it('flattens errors and keeps a string code', () => {
    const err = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' })
    expect(errorMeta(err)).toEqual({
      errName: 'Error',
      errMessage: 'refused',
      errCode: 'ECONNREFUSED',
    })
    expect(errorMeta(new TypeError('bad'))).toEqual({ errName: 'TypeError', errMessage: 'bad' })
    expect(errorMeta('plain')).toEqual({ errMessage: 'plain' })
  })
})

describe('makeLogger', () => {
  it('returns a child that accepts a message and metadata', () => {
    const log = makeLogger('LoggerTest', { run: 1 })
    expect(() => log.child({ step: 2 }).info('hello', { a: 1 })).not.toThrow()
  })
})
