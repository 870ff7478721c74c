import { containsToken } from "./utils.js";

export type Verdict =
  | { readonly kind: "approve" }
  | { readonly kind: "revise" }
  | { readonly kind: "unclear"; readonly reason: "none" | "both" };

export interface VerdictTokens {
  readonly approve: string;
  readonly revise: string;
}

/** Classify a critic reply. Exactly one token must be present for a clear verdict. */
export function classifyVerdict(content: string, tokens: VerdictTokens): Verdict {
  const approve = containsToken(content, tokens.approve);
  const revise = containsToken(content, tokens.revise);
  if (approve && revise) return { kind: "unclear", reason: "both" };
  if (approve) return { kind: "approve" };
  if (revise) return { kind: "revise" };
  return { kind: "unclear", reason: "none" };
}

export function isApproved(verdict: Verdict): boolean {
  return verdict.kind === "approve";
}
