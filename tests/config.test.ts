import { defaultAnalysisConfig, resolveAnalysisConfig, validateAnalysisConfig } from '../src/cadence/config.js';

describe('Analysis configuration', () => {
  test('fills in defaults', () => {
    expect(resolveAnalysisConfig()).toEqual(defaultAnalysisConfig);
    expect(resolveAnalysisConfig({ eventCombination: 'all' })).toEqual({
      eventCombination: 'all',
      frequencyPolicy: 'integer-multiple',
      allowLookahead: true,
      warnUnusedInputs: true,
    });
  });

  test('accepts every known option', () => {
    expect(
      validateAnalysisConfig({
        eventCombination: 'all',
        frequencyPolicy: 'equal',
        allowLookahead: false,
        warnUnusedInputs: false,
        include: 'specs/*.cdc',
      })
    ).toEqual({
      config: { eventCombination: 'all', frequencyPolicy: 'equal', allowLookahead: false, warnUnusedInputs: false },
      include: ['specs/*.cdc'],
      errors: [],
    });
    expect(validateAnalysisConfig({ include: ['a.cdc', 'b/*.cdc'] }).include).toEqual(['a.cdc', 'b/*.cdc']);
    expect(validateAnalysisConfig({})).toEqual({ config: {}, errors: [] });
  });

  test('reports each bad entry', () => {
    expect(
      validateAnalysisConfig({ eventCombination: 'some', allowLookahead: 'yes', include: [1], colour: true }).errors
    ).toEqual([
      'eventCombination must be "any" or "all"',
      'allowLookahead must be a boolean',
      'include must be a string or string[]',
      'unknown option "colour"',
    ]);
  });

  test('rejects anything but an object', () => {
    expect(validateAnalysisConfig([]).errors).toEqual(['configuration must be a JSON object']);
    expect(validateAnalysisConfig(null).errors).toEqual(['configuration must be a JSON object']);
  });
});
