/**
 * Structured logging helpers for reconciler workflows.
 *
 * Every line carries the workflow envelope and an event_name. Source URLs are
 * reduced to host, path and a short hash; query strings never reach the logs.
 */

import { createHash } from 'crypto'
import type { ILogger } from '@kibble/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  watermark?: string
  shard?: number
  productKey?: string
  sourceId?: string
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

// Keys holding full URLs; replaced by sanitizeUrl() output.
const URL_KEYS = new Set(['sourceUrl', 'imageUrl', 'url'])

export interface WorkflowLogger {
  debug: (event: string, meta?: LogMeta, err?: unknown) => void
  info: (event: string, meta?: LogMeta, err?: unknown) => void
  warn: (event: string, meta?: LogMeta, err?: unknown) => void
  error: (event: string, meta?: LogMeta, err?: unknown) => void
  fatal: (event: string, meta?: LogMeta, err?: unknown) => void
  child: (extra: Partial<WorkflowContext>) => WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const logWith = (
    level: 'debug' | 'info' | 'warn' | 'error' | 'fatal',
    event: string,
    meta?: LogMeta,
    err?: unknown
  ) => {
    const payload = sanitizeMeta({
      event_name: event,
      ...baseContext,
      ...(meta ? compact(meta) : {}),
    })
    switch (level) {
      case 'debug':
        base.debug(event, payload)
        break
      case 'info':
        base.info(event, payload)
        break
      default:
        base[level](event, payload, err)
    }
  }

  return {
    debug: (event, meta) => logWith('debug', event, meta),
    info: (event, meta) => logWith('info', event, meta),
    warn: (event, meta, err) => logWith('warn', event, meta, err),
    error: (event, meta, err) => logWith('error', event, meta, err),
    fatal: (event, meta, err) => logWith('fatal', event, meta, err),
    child: (extra) => createWorkflowLogger(base, { ...context, ...extra }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function sanitizeMeta(meta: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, value] of Object.entries(meta)) {
    if (URL_KEYS.has(key) && typeof value === 'string') {
      const sanitized = sanitizeUrl(value)
      next[`${key}Host`] = sanitized.urlHost
      next[`${key}Hash`] = sanitized.urlHash
      continue
    }
    next[key] = value
  }
  return compact(next)
}

function compact(value: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
