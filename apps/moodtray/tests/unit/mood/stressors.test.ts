/**
 * Stressor and tooltip formatting tests
 */

import { describeStressors, formatTooltip, stateLabel } from '../../../src/mood/stressors';
import { makeSample, thresholds } from '../../helpers/fixtures';

describe('stressors', () => {
  const config = thresholds();

  describe('describeStressors', () => {
    it('should list metrics at or above their high threshold', () => {
      expect(describeStressors(makeSample(82, 75, 900), config)).toEqual([
        'High CPU (82.0%)',
        'High RAM (75.0%)',
        'High Network (900.0 KB/s)',
      ]);
    });

    it('should return nothing when all metrics are below high', () => {
      expect(describeStressors(makeSample(69.9, 74.9, 799), config)).toEqual([]);
    });

    it('should only consider the selected metrics', () => {
      expect(describeStressors(makeSample(82, 90, 900), config, ['ram'])).toEqual(['High RAM (90.0%)']);
    });
  });

  describe('formatTooltip', () => {
    it('should format state and score', () => {
      expect(formatTooltip('calm', 12.34)).toBe('Mood: Calm (12.3% stress)');
    });

    it('should append stressors', () => {
      expect(formatTooltip('stressed', 92.3, ['High CPU (80.0%)', 'High RAM (80.0%)'])).toBe(
        'Mood: Stressed (92.3% stress): High CPU (80.0%), High RAM (80.0%)'
      );
    });
  });

  it('should capitalise state labels', () => {
    expect(stateLabel('overloaded')).toBe('Overloaded');
  });
});
