/**
 * Ordered (predicate, outcome) rule chains. The first rule whose predicate holds wins;
 * the fallback runs when none does.
 */
export type Rule<I, O> = {
  name: string;
  when: (input: I) => boolean;
  then: (input: I) => O;
};

export type RuleMatch<O> = { rule: string; outcome: O };

export const firstMatch = <I, O>(rules: ReadonlyArray<Rule<I, O>>, input: I, fallback: Rule<I, O>['then']): RuleMatch<O> => {
  for (const rule of rules) {
    if (rule.when(input)) return { rule: rule.name, outcome: rule.then(input) };
  }
  return { rule: 'fallback', outcome: fallback(input) };
};
