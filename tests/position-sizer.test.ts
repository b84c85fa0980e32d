import { describe, it, expect } from 'vitest';
import { capHeadroomUsd, legThresholdPct, maxLegs, nextAction } from '../src/risk/position-sizer.js';
import { hedgeConfig } from './helpers/fakes.js';

const flat = { legsFilled: 0, totalNotionalUsd: 0 };

describe('nextAction', () => {
  it('returns NONE below the trigger', () => {
    const config = hedgeConfig();
    expect(nextAction(flat, 11.99, config)).toEqual({ kind: 'NONE' });
    expect(nextAction(flat, 0, config)).toEqual({ kind: 'NONE' });
  });

  it('opens the initial leg at exactly the trigger', () => {
    expect(nextAction(flat, 12, hedgeConfig())).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1500 });
  });

  it('walks the scale-in tiers in order and caps after the last leg', () => {
    const config = hedgeConfig({ triggerDropPct: 8 });
    expect(nextAction(flat, 7.99, config)).toEqual({ kind: 'NONE' });
    expect(nextAction(flat, 8, config)).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1500 });

    const oneLeg = { legsFilled: 1, totalNotionalUsd: 1500 };
    expect(nextAction(oneLeg, 9.99, config)).toEqual({ kind: 'NONE' });
    expect(nextAction(oneLeg, 10, config)).toEqual({ kind: 'SCALE_IN', legIndex: 1, notionalUsd: 1500 });

    const twoLegs = { legsFilled: 2, totalNotionalUsd: 3000 };
    expect(nextAction(twoLegs, 11.99, config)).toEqual({ kind: 'NONE' });
    expect(nextAction(twoLegs, 12, config)).toEqual({ kind: 'SCALE_IN', legIndex: 2, notionalUsd: 1500 });

    const threeLegs = { legsFilled: 3, totalNotionalUsd: 4500 };
    expect(nextAction(threeLegs, 20, config)).toEqual({ kind: 'CAP_REACHED' });
  });

  it('never skips a tier on a deep gap down', () => {
    const config = hedgeConfig({ triggerDropPct: 8 });
    const oneLeg = { legsFilled: 1, totalNotionalUsd: 1500 };
    expect(nextAction(oneLeg, 30, config)).toEqual({ kind: 'SCALE_IN', legIndex: 1, notionalUsd: 1500 });
  });

  it('caps immediately after the first leg when scale-in is off', () => {
    const config = hedgeConfig({ enableScaleIn: false, maxUsdPosition: 1500 });
    expect(nextAction(flat, 13, config)).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1500 });
    expect(nextAction({ legsFilled: 1, totalNotionalUsd: 1500 }, 13, config)).toEqual({ kind: 'CAP_REACHED' });
    expect(nextAction({ legsFilled: 1, totalNotionalUsd: 1500 }, 5, config)).toEqual({ kind: 'NONE' });
  });

  it('clips the last leg to the remaining headroom', () => {
    const config = hedgeConfig({ maxUsdPosition: 4000 });
    const twoLegs = { legsFilled: 2, totalNotionalUsd: 3000 };
    expect(nextAction(twoLegs, 20, config)).toEqual({ kind: 'SCALE_IN', legIndex: 2, notionalUsd: 1000 });
    expect(nextAction({ legsFilled: 3, totalNotionalUsd: 4000 }, 20, config)).toEqual({ kind: 'CAP_REACHED' });
  });

  it('clips the initial leg to the combined headroom', () => {
    const config = hedgeConfig({ usdPositionSize: 1500, maxUsdPosition: 1500, capScope: 'combined' });
    expect(nextAction(flat, 12, config, 500)).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1000 });
  });

  it('counts the other side in combined scope', () => {
    const config = hedgeConfig({ maxUsdPosition: 3000, capScope: 'combined' });
    expect(nextAction(flat, 12, config, 2000)).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1000 });
    expect(nextAction(flat, 12, config, 3000)).toEqual({ kind: 'CAP_REACHED' });
    expect(nextAction({ legsFilled: 1, totalNotionalUsd: 1500 }, 20, config, 1500)).toEqual({ kind: 'CAP_REACHED' });
  });

  it('ignores the other side in side scope', () => {
    const config = hedgeConfig({ maxUsdPosition: 3000 });
    expect(nextAction(flat, 12, config, 3000)).toEqual({ kind: 'OPEN_INITIAL', notionalUsd: 1500 });
  });

  it('treats an order below the minimum as capped', () => {
    const config = hedgeConfig({ maxUsdPosition: 3003, minOrderUsd: 5 });
    expect(nextAction({ legsFilled: 2, totalNotionalUsd: 3000 }, 20, config)).toEqual({ kind: 'CAP_REACHED' });
  });

  it('never lets the total exceed the max for any drawdown path', () => {
    const config = hedgeConfig({ usdPositionSize: 700, maxUsdPosition: 2000, scaleInLegs: 5, triggerDropPct: 3, scaleInDropStep: 1.5 });
    let position = { legsFilled: 0, totalNotionalUsd: 0 };
    for (let pct = 0; pct <= 40; pct += 0.25) {
      const action = nextAction(position, pct, config);
      if (action.kind === 'OPEN_INITIAL' || action.kind === 'SCALE_IN') {
        position = { legsFilled: position.legsFilled + 1, totalNotionalUsd: position.totalNotionalUsd + action.notionalUsd };
      }
      expect(position.totalNotionalUsd).toBeLessThanOrEqual(config.maxUsdPosition);
    }
    expect(position).toEqual({ legsFilled: 3, totalNotionalUsd: 2000 });
  });
});

describe('helpers', () => {
  it('computes tier thresholds', () => {
    const config = hedgeConfig({ triggerDropPct: 8 });
    expect([0, 1, 2].map((k) => legThresholdPct(k, config))).toEqual([8, 10, 12]);
    expect(legThresholdPct(2, hedgeConfig({ enableScaleIn: false }))).toBe(12);
  });

  it('counts legs and headroom', () => {
    expect(maxLegs(hedgeConfig())).toBe(3);
    expect(maxLegs(hedgeConfig({ enableScaleIn: false }))).toBe(1);
    expect(capHeadroomUsd(4000, hedgeConfig())).toBe(500);
    expect(capHeadroomUsd(5000, hedgeConfig())).toBe(0);
    expect(capHeadroomUsd(1000, hedgeConfig({ capScope: 'combined' }), 3000)).toBe(500);
  });
});
