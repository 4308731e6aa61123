/**
 * CLINICAL QUALITY VALIDATOR
 *
 * Deterministic rule-based scoring of generated narrative text. Does not use
 * an LLM.
 *
 * Each rule either passes or produces a finding. Blocking findings become
 * issues and fail the output regardless of score; advisory findings become
 * warnings. Score = 100 minus the weights of all findings.
 */

import { stripThinkBlocks } from "./backends";
import type { ModelTier, ValidationMetrics, ValidationResult } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type RuleSeverity = "blocking" | "advisory";

export interface ValidationContext {
  taskId: string;
  domainKey: string;
  tier: ModelTier;
}

export interface QualityValidator {
  validate(attemptId: string, text: string, context: ValidationContext): ValidationResult;
  readonly threshold: number;
}

export interface ValidatorOptions {
  threshold: number;
  strict?: boolean;
  minChars?: number;
  maxChars?: number;
}

interface Finding {
  severity: RuleSeverity;
  weight: number;
  message: string;
}

// ============================================================================
// LEXICON
// ============================================================================

export const NEAR_EMPTY_CHARS = 20;

const BLOCKING_WEIGHT = 25;
const ADVISORY_WEIGHT = 10;

const PERCENTILE_ADVISORY_CEILING = 3;
const PERCENTILE_BLOCKING_CEILING = 5;
const SCORE_MENTION_CEILING = 2;
const MIN_CLINICAL_TERMS = 2;
const MIN_SENTENCES = 2;
const WORDS_PER_SENTENCE = { min: 6, max: 45 };

/** Instrument names that belong in the score tables, not the narrative. */
export const TEST_NAMES = [
  "WAIS", "WISC", "WPPSI", "WIAT", "KTEA", "NEPSY", "D-KEFS", "CVLT", "ROCFT",
  "Rey", "Trail Making", "BASC", "BRIEF", "Conners", "CAARS", "CEFI", "NAB", "RBANS",
] as const;

export const CLINICAL_TERMS = [
  "cognitive", "functioning", "ability", "skills", "performance",
  "difficulties", "challenges", "strengths", "weaknesses",
] as const;

const PERCENTILE_PATTERN = /\b\d+(?:st|nd|rd|th)\s*percentile/gi;
const SCORE_PATTERN = /\b(?:T-score|standard score|scaled score|raw score)s?\s*(?:of|=|:)?\s*\d+/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const TEST_NAME_PATTERNS = TEST_NAMES.map((name) => new RegExp(`\\b${escapeRegExp(name)}\\b`, "i"));

// ============================================================================
// METRICS
// ============================================================================

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+(?:\s+|$)/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function measureText(text: string): ValidationMetrics {
  const lower = text.toLowerCase();
  const sentences = splitSentences(text);
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const meanWordsPerSentence = sentences.length > 0
    ? Math.round((words.length / sentences.length) * 10) / 10
    : 0;

  return {
    length: text.length,
    percentileMentions: countMatches(text, PERCENTILE_PATTERN),
    scoreMentions: countMatches(text, SCORE_PATTERN),
    testNameMentions: TEST_NAME_PATTERNS.filter((pattern) => pattern.test(text)).length,
    clinicalTerms: CLINICAL_TERMS.filter((term) => lower.includes(term)).length,
    sentences: sentences.length,
    meanWordsPerSentence,
  };
}

// ============================================================================
// VALIDATOR
// ============================================================================

export class ClinicalQualityValidator implements QualityValidator {
  readonly threshold: number;
  private readonly strict: boolean;
  private readonly minChars: number;
  private readonly maxChars: number;

  constructor(options: ValidatorOptions) {
    this.threshold = options.threshold;
    this.strict = options.strict ?? false;
    this.minChars = options.minChars ?? (this.strict ? 150 : 100);
    this.maxChars = options.maxChars ?? (this.strict ? 800 : 1000);
  }

  validate(attemptId: string, rawText: string, _context: ValidationContext): ValidationResult {
    const text = stripThinkBlocks(rawText);
    const metrics = measureText(text);

    if (text.length < NEAR_EMPTY_CHARS) {
      return {
        attemptId,
        score: 0,
        issues: [`Output is empty or near-empty (${text.length} chars)`],
        warnings: [],
        passed: false,
        metrics,
      };
    }

    const findings = this.evaluate(metrics);
    const issues = findings.filter((f) => f.severity === "blocking").map((f) => f.message);
    const warnings = findings.filter((f) => f.severity === "advisory").map((f) => f.message);
    const deductions = findings.reduce((sum, f) => sum + f.weight, 0);
    const score = Math.max(0, Math.min(100, 100 - deductions));

    return {
      attemptId,
      score,
      issues,
      warnings,
      passed: issues.length === 0 && score >= this.threshold,
      metrics,
    };
  }

  private finding(severity: RuleSeverity, message: string): Finding {
    return {
      severity,
      weight: severity === "blocking" ? BLOCKING_WEIGHT : ADVISORY_WEIGHT,
      message,
    };
  }

  private evaluate(m: ValidationMetrics): Finding[] {
    const findings: Finding[] = [];
    const strictSeverity: RuleSeverity = this.strict ? "blocking" : "advisory";

    if (m.length < this.minChars) {
      findings.push(this.finding("blocking", `Output too short (${m.length} chars, minimum ${this.minChars})`));
    }
    if (m.length > this.maxChars) {
      findings.push(this.finding("advisory", `Output lengthy (${m.length} chars, target <${this.maxChars})`));
    }

    if (m.percentileMentions > PERCENTILE_BLOCKING_CEILING) {
      findings.push(this.finding(
        "blocking",
        `Too many percentile mentions (${m.percentileMentions}) - should be sparse (<${PERCENTILE_BLOCKING_CEILING})`,
      ));
    } else if (m.percentileMentions > PERCENTILE_ADVISORY_CEILING) {
      findings.push(this.finding(
        "advisory",
        `Frequent percentile mentions (${m.percentileMentions}) - consider reducing`,
      ));
    }

    if (m.scoreMentions > SCORE_MENTION_CEILING) {
      findings.push(this.finding(strictSeverity, `Excessive score reporting (${m.scoreMentions} mentions)`));
    }

    if (m.testNameMentions > 0) {
      findings.push(this.finding(
        strictSeverity,
        `Test names mentioned (${m.testNameMentions}) - use general terms`,
      ));
    }

    if (m.clinicalTerms < MIN_CLINICAL_TERMS) {
      findings.push(this.finding("advisory", "May lack clinical terminology"));
    }

    if (m.sentences < MIN_SENTENCES) {
      findings.push(this.finding("blocking", "Output should contain multiple sentences"));
    } else if (
      m.meanWordsPerSentence < WORDS_PER_SENTENCE.min ||
      m.meanWordsPerSentence > WORDS_PER_SENTENCE.max
    ) {
      findings.push(this.finding(
        "advisory",
        `Unusual sentence length (${m.meanWordsPerSentence} words per sentence)`,
      ));
    }

    return findings;
  }
}
