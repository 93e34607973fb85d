import { describe, it, expect } from 'vitest';
import { DemoAnalyzer, DEMO_NOTE } from '../../src/analyzers/DemoAnalyzer.js';
import { DiseaseCatalog } from '../../src/catalog/DiseaseCatalog.js';
import { AnalyzerError } from '../../src/errors.js';
import { jpegImage } from '../fixtures/images.js';

/** Returns the given values in order. */
function sequence(...values: number[]) {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('DemoAnalyzer', () => {
  const catalog = DiseaseCatalog.load();
  const signal = new AbortController().signal;

  it('should pick a catalog disease and a confidence in range', async () => {
    // index floor(0 * 11) = 0 → tomato_early_blight; confidence 0.6 + 0.5 * 0.3 = 0.75
    const analyzer = new DemoAnalyzer(catalog, { random: sequence(0, 0.5) });

    const result = await analyzer.infer(jpegImage(), signal);

    expect(result).toEqual({
      crop: 'tomato',
      diseaseKey: 'tomato_early_blight',
      confidence: 0.75,
      severity: 'moderate',
      observedSymptoms: [
        'Dark spots with concentric rings on leaves',
        'Yellowing of leaves around spots',
        'Premature leaf drop starting from bottom',
      ],
      sourceEngine: 'demo_fallback',
      notes: DEMO_NOTE,
    });
  });

  it('should never pick the healthy entry', async () => {
    const analyzer = new DemoAnalyzer(catalog, { random: sequence(0.999, 0) });

    const result = await analyzer.infer(jpegImage(), signal);

    expect(result.diseaseKey).toBe('onion_purple_blotch');
    expect(result.confidence).toBe(0.6);
  });

  it('should honour a configured confidence range', async () => {
    const analyzer = new DemoAnalyzer(catalog, {
      random: sequence(0.3, 0.5),
      confidenceRange: { min: 0.2, max: 0.4 },
    });

    expect((await analyzer.infer(jpegImage(), signal)).confidence).toBe(0.3);
  });

  it('should fail when the catalog holds no diseases', async () => {
    const analyzer = new DemoAnalyzer(new DiseaseCatalog([]));

    await expect(analyzer.infer(jpegImage(), signal)).rejects.toThrow(AnalyzerError);
  });
});
