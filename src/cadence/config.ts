/**
 * Policy points of the analysis. The defaults follow the usual conventions of
 * stream-based monitoring languages; each can be tightened per project.
 */
export interface AnalysisConfig {
  /**
   * How the clocks of several event-driven dependencies combine when a stream
   * has no annotation: `any` fires when one of them fires, `all` only when
   * all of them fire together.
   */
  eventCombination: 'any' | 'all';
  /**
   * `integer-multiple`: two periodic clocks are compatible when the faster
   * frequency is an integer multiple of the slower one.
   * `equal`: only identical frequencies are compatible.
   */
  frequencyPolicy: 'integer-multiple' | 'equal';
  /** Whether `offset(by: n)` with `n > 0` is accepted at all. */
  allowLookahead: boolean;
  /** Warn about input streams no other stream reads. */
  warnUnusedInputs: boolean;
}

export const defaultAnalysisConfig: Readonly<AnalysisConfig> = {
  eventCombination: 'any',
  frequencyPolicy: 'integer-multiple',
  allowLookahead: true,
  warnUnusedInputs: true,
};

export function resolveAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  return { ...defaultAnalysisConfig, ...overrides };
}

export interface ConfigValidation {
  config: Partial<AnalysisConfig>;
  /** Source globs checked when the command line names none. */
  include?: string[];
  errors: string[];
}

/** Checks a raw `cadence.config.json` object entry by entry. */
export function validateAnalysisConfig(raw: unknown): ConfigValidation {
  const errors: string[] = [];
  const config: Partial<AnalysisConfig> = {};

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { config, errors: ['configuration must be a JSON object'] };
  }
  const entries = new Map<string, unknown>(Object.entries(raw));

  const eventCombination = entries.get('eventCombination');
  if (eventCombination !== undefined) {
    if (eventCombination === 'any' || eventCombination === 'all') config.eventCombination = eventCombination;
    else errors.push('eventCombination must be "any" or "all"');
  }

  const frequencyPolicy = entries.get('frequencyPolicy');
  if (frequencyPolicy !== undefined) {
    if (frequencyPolicy === 'integer-multiple' || frequencyPolicy === 'equal') config.frequencyPolicy = frequencyPolicy;
    else errors.push('frequencyPolicy must be "integer-multiple" or "equal"');
  }

  const allowLookahead = entries.get('allowLookahead');
  if (allowLookahead !== undefined) {
    if (typeof allowLookahead === 'boolean') config.allowLookahead = allowLookahead;
    else errors.push('allowLookahead must be a boolean');
  }

  const warnUnusedInputs = entries.get('warnUnusedInputs');
  if (warnUnusedInputs !== undefined) {
    if (typeof warnUnusedInputs === 'boolean') config.warnUnusedInputs = warnUnusedInputs;
    else errors.push('warnUnusedInputs must be a boolean');
  }

  let include: string[] | undefined;
  const rawInclude = entries.get('include');
  if (rawInclude !== undefined) {
    if (typeof rawInclude === 'string') include = [rawInclude];
    else if (Array.isArray(rawInclude) && rawInclude.every((v): v is string => typeof v === 'string')) include = rawInclude;
    else errors.push('include must be a string or string[]');
  }

  const known = new Set(['eventCombination', 'frequencyPolicy', 'allowLookahead', 'warnUnusedInputs', 'include']);
  for (const key of entries.keys()) {
    if (!known.has(key)) errors.push(`unknown option "${key}"`);
  }

  return include ? { config, include, errors } : { config, errors };
}
