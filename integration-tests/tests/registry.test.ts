/**
 * Extractor Registry Tests
 */

import {
  clearRegistry,
  getExtractor,
  getExtractorOrThrow,
  getRegisteredStrategies,
  hasExtractor,
  heuristicExtractor,
  registerAllExtractors,
  schemas,
} from '@finsheet/shared';

describe('Extractor registry', () => {
  afterEach(() => {
    registerAllExtractors();
  });

  it('should register both strategies on load', () => {
    expect(getRegisteredStrategies().sort()).toEqual(['heuristic', 'model_assisted']);
    expect(getExtractor('heuristic')).toBe(heuristicExtractor);
  });

  it('should throw for a strategy with no extractor', () => {
    clearRegistry();

    expect(hasExtractor('model_assisted')).toBe(false);
    expect(getExtractor('model_assisted')).toBeUndefined();
    expect(() => getExtractorOrThrow('model_assisted')).toThrow(
      'No extractor registered for strategy: model_assisted'
    );
  });

  it('should load the record contract from docs/contracts', () => {
    expect(schemas.financialRecord.title).toBe('FinancialRecord');
  });
});
