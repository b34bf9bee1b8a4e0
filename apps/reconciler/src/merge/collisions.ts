/**
 * Key collision detection.
 *
 * Records that share a base key but whose names disagree are kept apart as
 * baseKey, baseKey#2, ... and queued for review, unless the merge log holds an
 * approved decision for the key.
 */

import { startsWithTokens, tokenize as tokenizeText } from '@kibble/brand'
import type { MergeDecision, PreparedRecord, ReviewItem } from '../types'
import { tokenize, jaccardFromTokens } from '../scoring/text-similarity'
import { compareRecords, latestObservations } from './merge'

export const DEFAULT_COLLISION_THRESHOLD = 0.5
export const KEY_SUFFIX_SEPARATOR = '#'

export interface KeyCluster {
  productKey: string
  anchor: PreparedRecord
  /** Anchor similarity to the first cluster's anchor, 3 decimals */
  similarity: number
  members: PreparedRecord[]
}

export interface CollisionResult {
  baseKey: string
  clusters: KeyCluster[]
  decision: MergeDecision['decision'] | null
  /** Present when the split needs a human decision */
  review: ReviewItem | null
}

/**
 * Name tokens compared for similarity: the cleaned name without leading
 * brand words or pack sizes. Stop words are kept; "Classic Chicken Recipe"
 * and "Chicken Formula" must not look identical.
 */
export function similarityTokens(member: PreparedRecord): string[] {
  const tokens = tokenize(member.brand.cleanedProductName)
  const brandTokens = tokenizeText(member.brand.brandSlug)
  return startsWithTokens(tokens, brandTokens) ? tokens.slice(brandTokens.length) : tokens
}

export function suffixedKey(baseKey: string, index: number): string {
  return index === 0 ? baseKey : `${baseKey}${KEY_SUFFIX_SEPARATOR}${index + 1}`
}

/**
 * Latest approved decision for a key. Unapproved entries are ignored.
 */
export function approvedDecision(
  decisions: readonly MergeDecision[],
  baseKey: string
): MergeDecision | null {
  let latest: MergeDecision | null = null
  for (const decision of decisions) {
    if (decision.baseKey !== baseKey || !decision.approved) continue
    if (!latest || (decision.decidedAt ?? '') >= (latest.decidedAt ?? '')) {
      latest = decision
    }
  }
  return latest
}

/**
 * Cluster the members of one base key. Members are visited in merge order;
 * each joins the most similar existing cluster whose anchor it matches at
 * or above the threshold, else it anchors a new cluster.
 */
export function detectCollisions(
  baseKey: string,
  records: readonly PreparedRecord[],
  decisions: readonly MergeDecision[],
  threshold: number = DEFAULT_COLLISION_THRESHOLD
): CollisionResult {
  const members = latestObservations(records).sort(compareRecords)
  const decision = approvedDecision(decisions, baseKey)
  const mergeAll = decision?.decision === 'MERGE'

  const drafts: Array<{ anchor: PreparedRecord; anchorTokens: string[]; members: PreparedRecord[] }> = []

  for (const member of members) {
    const tokens = similarityTokens(member)
    let bestIndex = -1
    let bestSimilarity = -1

    for (let index = 0; index < drafts.length; index++) {
      const similarity = jaccardFromTokens(tokens, drafts[index].anchorTokens)
      if (similarity > bestSimilarity) {
        bestIndex = index
        bestSimilarity = similarity
      }
    }

    if (bestIndex >= 0 && (mergeAll || bestSimilarity >= threshold)) {
      drafts[bestIndex].members.push(member)
      continue
    }
    drafts.push({ anchor: member, anchorTokens: tokens, members: [member] })
  }

  const primaryTokens = drafts[0]?.anchorTokens ?? []
  const clusters: KeyCluster[] = drafts.map((draft, index) => ({
    productKey: suffixedKey(baseKey, index),
    anchor: draft.anchor,
    similarity: Math.round(jaccardFromTokens(draft.anchorTokens, primaryTokens) * 1000) / 1000,
    members: draft.members,
  }))

  const needsReview = clusters.length > 1 && decision?.decision !== 'SPLIT'
  const review: ReviewItem | null = needsReview
    ? {
        baseKey,
        reason: 'KEY_COLLISION',
        clusters: clusters.map((cluster) => ({
          productKey: cluster.productKey,
          anchorName: cluster.anchor.brand.cleanedProductName,
          similarity: cluster.similarity,
          sourceIds: cluster.members.map((member) => member.record.sourceId).sort(),
        })),
      }
    : null

  return { baseKey, clusters, decision: decision?.decision ?? null, review }
}
