import { DefaultLeadBaseConflictError, PersistenceError } from "../errors";
import { LeadBaseStore } from "../db/store";
import { JsonObject, LeadBase, LeadBaseWithRules, RoutingRule } from "../types/ingest";
import { isJsonScalar, parseNumericString } from "./typeCoercion";

export const DEFAULT_LEAD_BASE_NAME = "Default";

type Condition = Pick<RoutingRule, "field" | "operator" | "value">;

/**
 * Evaluate one rule against the raw payload.
 * Missing, null and non-scalar values never match.
 */
export function evaluateCondition(rule: Condition, payload: JsonObject): boolean {
  const actual = payload[rule.field];
  if (actual === null || actual === undefined || !isJsonScalar(actual)) return false;

  switch (rule.operator) {
    case "equals":
      return String(actual) === rule.value;
    case "not_equals":
      return String(actual) !== rule.value;
    case "contains":
      return String(actual).includes(rule.value);
    case "greater_than":
    case "less_than": {
      const left = toNumber(actual);
      const right = parseNumericString(rule.value);
      if (left === null || right === null) {
        console.warn(
          `[routing] Could not evaluate ${rule.field} ${rule.operator} ${rule.value} (payload value: ${String(actual)})`
        );
        return false;
      }
      return rule.operator === "greater_than" ? left > right : left < right;
    }
  }
}

function toNumber(value: string | number | boolean): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string") return parseNumericString(value);
  return null;
}

/**
 * First non-default base whose rules all match.
 * Bases are tried by their lowest rule priority; bases without rules never match.
 */
export function selectLeadBase(bases: readonly LeadBaseWithRules[], payload: JsonObject): LeadBaseWithRules | null {
  const candidates = bases
    .filter((b) => !b.is_default && b.routing_rules.length > 0)
    .map((b) => ({ base: b, rank: Math.min(...b.routing_rules.map((r) => r.priority)) }))
    .sort((a, b) => a.rank - b.rank);

  for (const { base } of candidates) {
    if (base.routing_rules.every((rule) => evaluateCondition(rule, payload))) {
      return base;
    }
  }

  return null;
}

/**
 * Return the account's default base, creating it when absent.
 * Concurrent creators converge on one row; if that row is deleted before it
 * can be read, the insert is tried once more.
 */
export async function ensureDefaultLeadBase(store: LeadBaseStore, accountId: string): Promise<LeadBase> {
  const existing = await store.findDefault(accountId);
  if (existing) return existing;

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const created = await store.insert({ account_id: accountId, name: DEFAULT_LEAD_BASE_NAME, is_default: true });
      console.log(`[routing] Auto-created default base for account ${accountId}`);
      return created;
    } catch (error) {
      if (!(error instanceof DefaultLeadBaseConflictError)) throw error;

      const winner = await store.findDefault(accountId);
      if (winner) return winner;
    }
  }

  throw new PersistenceError(`Failed to create default lead base for account ${accountId}`);
}

/**
 * Pick the lead base for a payload: the first matching base, otherwise the
 * account's default
 */
export async function routeLead(store: LeadBaseStore, accountId: string, payload: JsonObject): Promise<LeadBase> {
  const bases = await store.listWithRules(accountId);

  const matched = selectLeadBase(bases, payload);
  if (matched) {
    console.log(`[routing] Lead routed to base '${matched.name}' (${matched.id})`);
    return matched;
  }

  const fallback = bases.find((b) => b.is_default) ?? (await ensureDefaultLeadBase(store, accountId));
  console.log(`[routing] Lead routed to default base '${fallback.name}' (${fallback.id})`);
  return fallback;
}
