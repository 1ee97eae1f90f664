import { IntentCategory } from './intent-categories.constants';

/**
 * Boosts léxicos aplicados ao peso do voto semântico
 *
 * Quando a query contém alguma das `cues`, o peso de cada categoria listada em
 * `categories` é multiplicado por `factor` (> 1 reforça, < 1 atenua).
 * As cues são comparadas como substring da query normalizada.
 */
export interface SemanticCueBoost {
  readonly name: string;
  readonly cues: readonly string[];
  readonly categories: readonly IntentCategory[];
  readonly factor: number;
}

export const SEMANTIC_CUE_BOOSTS: readonly SemanticCueBoost[] = [
  {
    name: 'procedure',
    cues: ['কিভাবে', 'নিয়ম', 'পদ্ধতি', 'প্রক্রিয়া', 'আবেদন'],
    categories: [IntentCategory.NAMJARI_APPLICATION_PROCEDURE],
    factor: 1.25,
  },
  {
    name: 'inheritance',
    cues: ['ওয়ারিশ', 'উত্তরাধিকার', 'হাল ওয়াশিাননামা', 'মৃত্যু সনদ'],
    categories: [IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS],
    factor: 1.2,
  },
  {
    name: 'correction',
    cues: ['ভুল', 'সংশোধন', 'বানান', 'দাগ নম্বর'],
    categories: [IntentCategory.NAMJARI_KHATIAN_CORRECTION],
    factor: 1.3,
  },
  {
    name: 'representative',
    cues: ['তার হয়ে', 'প্রতিনিধি', 'পাওয়ার অফ'],
    categories: [IntentCategory.NAMJARI_BY_REPRESENTATIVE],
    factor: 1.2,
  },
  {
    name: 'hearing',
    cues: ['শুনানি', 'আমিন'],
    categories: [IntentCategory.NAMJARI_HEARING_DOCUMENTS, IntentCategory.NAMJARI_HEARING_NOTIFICATION],
    factor: 1.15,
  },
  {
    name: 'status',
    cues: ['স্ট্যাটাস', 'অপেক্ষা', 'প্রক্রিয়াধীন'],
    categories: [IntentCategory.NAMJARI_STATUS_CHECK],
    factor: 1.2,
  },
  {
    // Perguntas de khatian/jorip tendem a cair em herança
    name: 'khatian-dampening',
    cues: ['খতিয়ান', 'জরিপ', '৪ ভাই'],
    categories: [IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS],
    factor: 0.7,
  },
];
