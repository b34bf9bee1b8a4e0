/**
 * Default reference data shipped in apps/reconciler/data.
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { z } from 'zod'
import type { BrandAliasMap } from '@kibble/brand'
import { ReconcileError } from '../errors'
import { brandAliasMapSchema } from '../records/schema'
import { completenessTiersSchema, type CompletenessTiers } from '../overrides/completeness'
import { scoringSchemeConfigSchema, type ScoringSchemeConfig } from '../scoring/quality-score'

const __dirname = dirname(fileURLToPath(import.meta.url))
export const DATA_DIR = resolve(__dirname, '..', '..', 'data')

function readDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = resolve(DATA_DIR, fileName)
  try {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
    return schema.parse(raw)
  } catch (error) {
    throw new ReconcileError('CONFIGURATION_ERROR', `Unreadable data file ${fileName}`, {
      cause: error,
      details: { path },
    })
  }
}

export function loadDefaultAliasMap(): BrandAliasMap {
  return readDataFile('brand-aliases.json', brandAliasMapSchema)
}

export function loadDefaultStopWords(): string[] {
  return readDataFile('stop-words.json', z.array(z.string().min(1)))
}

export function loadDefaultScoringScheme(): ScoringSchemeConfig {
  return readDataFile('scoring.json', scoringSchemeConfigSchema)
}

export function loadDefaultCompletenessTiers(): CompletenessTiers {
  return readDataFile('completeness-tiers.json', completenessTiersSchema)
}
