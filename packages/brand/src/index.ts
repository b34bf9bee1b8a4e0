/**
 * @kibble/brand - brand canonicalization for catalog records
 */

export {
  normalizeText,
  normalizeBrandString,
  slugifyBrand,
  startsWithTokens,
  titleCase,
  tokenize,
} from './normalization'

export {
  brandDisplayName,
  canonicalizeBrand,
  compileAliasMap,
  isDenylistedPrefix,
} from './canonicalize'

export type {
  BrandAliasEntry,
  BrandAliasMap,
  BrandConfidence,
  CanonicalBrand,
  CompiledAliasMap,
  SplitPattern,
} from './canonicalize'
