export interface Strategy<TInput, TResult> {
  name: string;
  run(input: TInput): TResult | undefined;
}

export interface StrategyHit<TResult> {
  strategy: string;
  result: TResult;
}

// Ordered fallback chain: the first strategy that yields a result wins.
export function firstDefined<TInput, TResult>(
  strategies: ReadonlyArray<Strategy<TInput, TResult>>,
  input: TInput
): StrategyHit<TResult> | undefined {
  for (const s of strategies) {
    const result = s.run(input);
    if (result !== undefined) return { strategy: s.name, result };
  }
  return undefined;
}
