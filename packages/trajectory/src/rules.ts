/**
 * Ordered intervention cascade.
 *
 * Rules run in array order and the first match wins; later rules are not
 * consulted even if they would also fire. The order below is part of the
 * public contract:
 *
 *   1. rapid-escalation     activationEnergy velocity  > risingActivationVelocity
 *   2. coherence-breakdown  consistency velocity       < consistencyVelocityFloor
 *   3. extreme-activation   predicted activationEnergy > activationCeiling
 *   4. rapid-disconnection  socialArchitecture velocity < socialVelocityFloor
 */

import type {
  InterventionContext,
  InterventionRule,
  InterventionThresholds,
  InterventionVerdict,
} from "./types.js";

const fmt = (value: number): string => value.toFixed(3);

export function createInterventionRules(
  thresholds: InterventionThresholds,
): readonly InterventionRule[] {
  const rules: InterventionRule[] = [
    {
      id: "rapid-escalation",
      reason: "rapid escalation",
      matches: ({ gradient }) =>
        gradient.velocity.activationEnergy > thresholds.risingActivationVelocity,
      describe: ({ gradient }) =>
        `activationEnergy velocity ${fmt(gradient.velocity.activationEnergy)}/s exceeds ${thresholds.risingActivationVelocity}`,
    },
    {
      id: "coherence-breakdown",
      reason: "coherence breakdown",
      matches: ({ gradient }) =>
        gradient.velocity.consistency < thresholds.consistencyVelocityFloor,
      describe: ({ gradient }) =>
        `consistency velocity ${fmt(gradient.velocity.consistency)}/s is below ${thresholds.consistencyVelocityFloor}`,
    },
    {
      id: "extreme-activation",
      reason: "extreme activation predicted",
      matches: ({ predicted }) =>
        predicted.activationEnergy > thresholds.activationCeiling,
      describe: ({ predicted }) =>
        `predicted activationEnergy ${fmt(predicted.activationEnergy)} exceeds ${thresholds.activationCeiling}`,
    },
    {
      id: "rapid-disconnection",
      reason: "rapid disconnection",
      matches: ({ gradient }) =>
        gradient.velocity.socialArchitecture < thresholds.socialVelocityFloor,
      describe: ({ gradient }) =>
        `socialArchitecture velocity ${fmt(gradient.velocity.socialArchitecture)}/s is below ${thresholds.socialVelocityFloor}`,
    },
  ];
  return Object.freeze(rules);
}

/**
 * Run `rules` in order against `context`; report only the first match.
 */
export function evaluateInterventions(
  rules: readonly InterventionRule[],
  context: InterventionContext,
): InterventionVerdict {
  for (const rule of rules) {
    if (rule.matches(context)) {
      return {
        recommended: true,
        rule: rule.id,
        reason: rule.reason,
        detail: rule.describe(context),
      };
    }
  }
  return { recommended: false };
}
