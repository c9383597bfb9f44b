/**
 * Model Tier Selection
 *
 * Picks a tier once per turn from lexical features of the query.
 *
 * Decision order:
 * 1. Explicit preference (haiku/sonnet/opus or a tier name)
 * 2. Cost budget at or above 80% → fast
 * 3. Complex keyword → advanced; simple keyword → fast
 * 4. Short question (≤5 words with "?") → fast
 * 5. Attachments → advanced
 * 6. Default → advanced
 */

import { DEFAULT_MODELS, type ModelTier, type ModelTierMap } from "../../config.js";

// ============================================
// TYPES
// ============================================

export interface SelectionCriteria {
  preferredModel?: string;
  costPercentUsed?: number;
  hasAttachments?: boolean;
}

export interface ModelSelection {
  tier: ModelTier;
  model: string;
  reason: string;
}

// ============================================
// THRESHOLDS & PATTERNS
// ============================================

export const COST_THRESHOLD_PERCENT = 80;

const SHORT_QUESTION_MAX_WORDS = 5;

const SIMPLE_PATTERNS = [
  "what time",
  "what day",
  "what date",
  "convert",
  "format",
  "translate to",
  "is this",
  "yes or no",
  "true or false",
  "classify",
  "categorize",
  "extract",
  "list the",
  "count the",
  "how many",
  "summarize briefly",
];

const COMPLEX_PATTERNS = [
  "analyze",
  "explain in detail",
  "compare and contrast",
  "write code",
  "debug",
  "implement",
  "design",
  "create a plan",
  "step by step",
  "research",
  "investigate",
];

const PREFERENCE_TIERS = new Map<string, ModelTier>([
  ["haiku", "fast"],
  ["sonnet", "balanced"],
  ["opus", "advanced"],
  ["fast", "fast"],
  ["balanced", "balanced"],
  ["advanced", "advanced"],
]);

// ============================================
// SELECTION
// ============================================

export function selectModel(
  query: string,
  criteria: SelectionCriteria = {},
  models: ModelTierMap = DEFAULT_MODELS,
): ModelSelection {
  const pick = (tier: ModelTier, reason: string): ModelSelection => ({ tier, model: models[tier], reason });

  const preferred = criteria.preferredModel?.toLowerCase();
  const preferredTier = preferred !== undefined ? PREFERENCE_TIERS.get(preferred) : undefined;
  if (preferredTier) {
    return pick(preferredTier, `user preference (${preferred})`);
  }

  const costPercent = criteria.costPercentUsed ?? 0;
  if (costPercent >= COST_THRESHOLD_PERCENT) {
    return pick("fast", `budget at ${costPercent.toFixed(1)}%`);
  }

  const normalized = query.toLowerCase().trim();
  if (COMPLEX_PATTERNS.some(pattern => normalized.includes(pattern))) {
    return pick("advanced", "complex task");
  }
  if (SIMPLE_PATTERNS.some(pattern => normalized.includes(pattern))) {
    return pick("fast", "simple task");
  }

  const wordCount = query.split(/\s+/).filter(Boolean).length;
  if (wordCount <= SHORT_QUESTION_MAX_WORDS && query.includes("?")) {
    return pick("fast", "quick question");
  }

  if (criteria.hasAttachments) {
    return pick("advanced", "file analysis");
  }

  return pick("advanced", "default");
}
