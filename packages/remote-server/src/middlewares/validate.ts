import { Request, Response, NextFunction } from 'express'
import { z } from 'zod'
import { makeLogger } from '@threadgraph/logger'
import type { IssueSchemaType } from '../schemas/index.js'

const logger = makeLogger('validate-middleware')

type Source = 'body' | 'params' | 'query'

function toIssues(error: z.ZodError): IssueSchemaType[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }))
}

function validate<T extends z.ZodTypeAny>(source: Source, schema: T) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[source])

    if (!result.success) {
      const issues = toIssues(result.error)
      logger.warn('invalid request', { source, issues })

      return res.status(400).json({
        success: false,
        error: { code: 'VALIDATION', message: `invalid request ${source}`, details: { issues } },
      })
    }

    // parsed values live in res.locals; req.query is read-only in some setups
    res.locals[source] = result.data
    return next()
  }
}

export const validateBody = <T extends z.ZodTypeAny>(schema: T) => validate('body', schema)
export const validateParams = <T extends z.ZodTypeAny>(schema: T) => validate('params', schema)
export const validateQuery = <T extends z.ZodTypeAny>(schema: T) => validate('query', schema)
