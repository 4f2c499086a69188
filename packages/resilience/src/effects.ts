/**
 * Side effects the primitives depend on. Production code uses the defaults;
 * tests inject a controllable clock and an instant delay.
 */
export interface ResilienceEffects {
  delay: (ms: number) => Promise<void>;
  now: () => number;
}

export const defaultEffects: ResilienceEffects = {
  delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
};

export function resolveEffects(overrides?: Partial<ResilienceEffects>): ResilienceEffects {
  return { ...defaultEffects, ...overrides };
}
