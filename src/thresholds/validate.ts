import { NEUTRAL_ZONE, type ZoneThreshold } from './types.js';
import { regionsIntersect, ruleDirection, type ZoneOrder } from './zones.js';

export class ThresholdConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid zone threshold configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ThresholdConfigError';
  }
}

export function validateZoneOrder(name: string, zones: readonly string[]): string[] {
  const issues: string[] = [];
  if (zones.length === 0) {
    issues.push(`zone order "${name}" is empty`);
    return issues;
  }
  const neutralCount = zones.filter((zone) => zone === NEUTRAL_ZONE).length;
  if (neutralCount !== 1) {
    issues.push(`zone order "${name}" must contain "${NEUTRAL_ZONE}" exactly once`);
  }
  const seen = new Set<string>();
  for (const zone of zones) {
    if (seen.has(zone)) {
      issues.push(`zone order "${name}" lists "${zone}" more than once`);
    }
    seen.add(zone);
  }
  return issues;
}

function describeKey(rule: ZoneThreshold): string {
  return `${rule.ownerId}/${rule.timeframe}/${rule.indicatorName}`;
}

function describeRule(rule: ZoneThreshold): string {
  if (rule.comparison === 'between') {
    return `${rule.zoneName} (between ${rule.minValue} and ${rule.maxValue ?? '?'})`;
  }
  return `${rule.zoneName} (${rule.comparison} ${rule.minValue})`;
}

/**
 * Checks the rules of one (owner, timeframe, indicator) key. Rules must already
 * be sorted in evaluation order.
 */
export function validateRuleGroup(rules: readonly ZoneThreshold[], order: ZoneOrder): string[] {
  const issues: string[] = [];
  if (rules.length === 0) return issues;
  const key = describeKey(rules[0]);

  const zones = new Set<string>();
  for (const rule of rules) {
    if (!order.has(rule.zoneName)) {
      issues.push(`${key}: zone "${rule.zoneName}" is not in the zone order [${order.zones.join(', ')}]`);
    }
    if (zones.has(rule.zoneName)) {
      issues.push(`${key}: zone "${rule.zoneName}" is defined more than once`);
    }
    zones.add(rule.zoneName);

    if (!Number.isFinite(rule.minValue)) {
      issues.push(`${key}: zone "${rule.zoneName}" has a non-finite bound`);
    }
    if (rule.comparison === 'between') {
      if (rule.maxValue === null || !Number.isFinite(rule.maxValue)) {
        issues.push(`${key}: zone "${rule.zoneName}" uses between without a finite max value`);
      } else if (rule.minValue > rule.maxValue) {
        issues.push(`${key}: zone "${rule.zoneName}" has min ${rule.minValue} above max ${rule.maxValue}`);
      }
    }
  }
  if (issues.length > 0) return issues;

  // One-sided rules form first-match ladders: the more extreme rung must sit further out.
  const upward = rules.filter((rule) => ruleDirection(rule.comparison) === 'upward');
  for (let i = 1; i < upward.length; i++) {
    if (!(upward[i].minValue < upward[i - 1].minValue)) {
      issues.push(
        `${key}: ${describeRule(upward[i])} is not below the more extreme ${describeRule(upward[i - 1])}`
      );
    }
  }
  const downward = rules.filter((rule) => ruleDirection(rule.comparison) === 'downward');
  for (let i = 1; i < downward.length; i++) {
    if (!(downward[i].minValue > downward[i - 1].minValue)) {
      issues.push(
        `${key}: ${describeRule(downward[i])} is not above the more extreme ${describeRule(downward[i - 1])}`
      );
    }
  }

  // Neutral is always tried last, so any zone it shares values with wins there.
  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      const a = rules[i];
      const b = rules[j];
      if (a.zoneName === NEUTRAL_ZONE || b.zoneName === NEUTRAL_ZONE) continue;
      const directionA = ruleDirection(a.comparison);
      const directionB = ruleDirection(b.comparison);
      if (directionA === directionB && directionA !== 'bounded') continue;
      if (regionsIntersect(a, b)) {
        issues.push(`${key}: ${describeRule(a)} overlaps ${describeRule(b)}`);
      }
    }
  }

  return issues;
}
