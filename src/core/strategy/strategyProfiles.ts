/**
 * Strategy profiles
 * A profile decides which regimes close an open position and which regimes
 * veto a fresh entry. The entry trigger itself is always the recovery signal.
 */

import { RegimeState } from '../../types';

export const STRATEGY_PROFILE_NAMES = ['conservative', 'aggressive'] as const;

export type StrategyProfileName = (typeof STRATEGY_PROFILE_NAMES)[number];

export interface StrategyProfile {
  name: StrategyProfileName;
  exitRegimes: ReadonlySet<RegimeState>;
  // Regimes on which a TRIGGER is ignored
  entryBlockRegimes: ReadonlySet<RegimeState>;
}

const BEARISH: RegimeState[] = ['RAINY', 'TYPHOON', 'TYPHOON_PANIC'];

/**
 * Profile registry mapping profile names to exit rules
 */
export const strategyProfiles: Readonly<Record<StrategyProfileName, StrategyProfile>> = {
  conservative: {
    name: 'conservative',
    exitRegimes: new Set<RegimeState>(BEARISH),
    entryBlockRegimes: new Set<RegimeState>(),
  },
  aggressive: {
    name: 'aggressive',
    exitRegimes: new Set<RegimeState>(['OVERCAST', ...BEARISH]),
    entryBlockRegimes: new Set<RegimeState>(BEARISH),
  },
};

export function isStrategyProfileName(name: string): name is StrategyProfileName {
  return STRATEGY_PROFILE_NAMES.some((n) => n === name);
}

/**
 * Get a strategy profile by name
 * @throws Error if the profile is not registered
 */
export function getStrategyProfile(name: string): StrategyProfile {
  if (!isStrategyProfileName(name)) {
    throw new Error(
      `Strategy profile "${name}" not found in registry. Available profiles: ${STRATEGY_PROFILE_NAMES.join(', ')}`
    );
  }
  return strategyProfiles[name];
}
