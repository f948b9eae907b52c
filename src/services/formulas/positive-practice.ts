import { nowIso } from '../../utils/time';

export interface IntentionRecord {
  practice: 'intention_setting';
  goal: string;
  affirmation: string;
  energy: string;
  timestamp: string;
}

export interface GratitudeRecord {
  practice: 'gratitude';
  gratitudeFor: string;
  vibrationLevel: string;
  effect: string;
  timestamp: string;
}

export interface EthicalAlignmentRecord {
  practice: 'ethical_alignment';
  action: string;
  harmsNoOne: boolean;
  servesGood: true;
  alignment: 'ALIGNED' | 'NOT ALIGNED';
  timestamp: string;
}

export interface ManifestationRecord {
  practice: 'manifestation_ritual';
  step1Intention: string;
  step2Visualization: string;
  step3Action: string;
  principle: string;
  status: 'ACTIVATED';
  timestamp: string;
}

export interface ProtectionRecord {
  practice: 'protection_ritual';
  protectedEntity: string;
  protectionType: string;
  affirmation: string;
  status: 'ACTIVE';
  timestamp: string;
}

export const DEFAULT_PROTECTION_TYPE = 'divine_guidance';

export function intentionSetting(goal: string, affirmation: string): IntentionRecord {
  return {
    practice: 'intention_setting',
    goal,
    affirmation,
    energy: 'Focused, positive intention',
    timestamp: nowIso(),
  };
}

export function gratitudePractice(gratitudeFor: string): GratitudeRecord {
  return {
    practice: 'gratitude',
    gratitudeFor,
    vibrationLevel: 'High',
    effect: 'Attracts positive outcomes',
    timestamp: nowIso(),
  };
}

export function ethicalAlignment(action: string, harmCheck: boolean): EthicalAlignmentRecord {
  return {
    practice: 'ethical_alignment',
    action,
    harmsNoOne: harmCheck,
    servesGood: true,
    alignment: harmCheck ? 'ALIGNED' : 'NOT ALIGNED',
    timestamp: nowIso(),
  };
}

export function manifestationRitual(
  desire: string,
  visualization: string,
  action: string
): ManifestationRecord {
  return {
    practice: 'manifestation_ritual',
    step1Intention: desire,
    step2Visualization: visualization,
    step3Action: action,
    principle: 'Thought → Feeling → Action → Reality',
    status: 'ACTIVATED',
    timestamp: nowIso(),
  };
}

export function protectionRitual(
  protectedEntity: string,
  protectionType: string = DEFAULT_PROTECTION_TYPE
): ProtectionRecord {
  return {
    practice: 'protection_ritual',
    protectedEntity,
    protectionType,
    affirmation: `${protectedEntity} is protected and guided by wisdom`,
    status: 'ACTIVE',
    timestamp: nowIso(),
  };
}
