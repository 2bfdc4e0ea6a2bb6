import { ToleranceConfig } from "../../config/runtimeConfig.js";
import { ComparisonResult } from "../../domain/models.js";

const NUMERIC_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
const DECIMAL_COMMA_PATTERN = /^[-+]?\d+,\d+$/;

export function parseNumericAnswer(raw: string): number | null {
  const trimmed = raw.trim();
  const candidate = DECIMAL_COMMA_PATTERN.test(trimmed) ? trimmed.replace(",", ".") : trimmed;

  if (!NUMERIC_PATTERN.test(candidate)) {
    return null;
  }

  const value = Number(candidate);
  return Number.isFinite(value) ? value : null;
}

/**
 * Numeric answers match within `relative * |claimed| + absolute`; anything else must
 * match exactly after trimming and collapsing whitespace.
 */
export function compareAnswers(claimed: string, executed: string, tolerance: ToleranceConfig): ComparisonResult {
  const claimedNumber = parseNumericAnswer(claimed);
  const executedNumber = parseNumericAnswer(executed);

  if (claimedNumber !== null && executedNumber !== null) {
    const allowed = tolerance.relative * Math.abs(claimedNumber) + tolerance.absolute;
    const difference = Math.abs(claimedNumber - executedNumber);
    return {
      matched: difference <= allowed,
      kind: "numeric",
      detail: `claimed ${claimedNumber}, executed ${executedNumber} (difference ${difference}, allowed ${allowed})`
    };
  }

  const matched = collapse(claimed) === collapse(executed);
  return {
    matched,
    kind: "text",
    detail: matched
      ? `claimed and executed answers are both "${collapse(claimed)}"`
      : `claimed "${collapse(claimed)}", executed "${collapse(executed)}"`
  };
}

export function noMatch(detail: string): ComparisonResult {
  return { matched: false, kind: "no_match", detail };
}

function collapse(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}
