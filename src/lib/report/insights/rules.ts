import type { Insight } from "../types";

/**
 * (조건, 문장 템플릿) 한 쌍
 * - 테이블 순서 = 우선순위. 처음 맞는 규칙 하나만 사용
 */
export type InsightRule<F> = {
  id: string;
  when: (facts: F) => boolean;
  build: (facts: F) => Insight;
};

export type RuleTable<F> = {
  rules: readonly InsightRule<F>[];
  fallback: (facts: F) => Insight;
};

export function matchRule<F>(table: RuleTable<F>, facts: F): { id: string; insight: Insight } {
  for (const rule of table.rules) {
    if (rule.when(facts)) return { id: rule.id, insight: rule.build(facts) };
  }
  return { id: "fallback", insight: table.fallback(facts) };
}

export function evaluate<F>(table: RuleTable<F>, facts: F): Insight {
  return matchRule(table, facts).insight;
}
