/**
 * Categorias de intenção - conjunto FECHADO, conhecido em tempo de build.
 *
 * Os valores são os rótulos usados nos datasets (coluna `category`/`tag`)
 * e na tabela de padrões.
 */
export enum IntentCategory {
  NAMJARI_PROCESS = 'namjari_process',
  NAMJARI_APPLICATION_PROCEDURE = 'namjari_application_procedure',
  NAMJARI_REGISTRATION = 'namjari_registration',
  NAMJARI_BY_REPRESENTATIVE = 'namjari_by_representative',
  NAMJARI_ELIGIBILITY = 'namjari_eligibility',
  NAMJARI_REQUIRED_DOCUMENTS = 'namjari_required_documents',
  NAMJARI_INHERITANCE_DOCUMENTS = 'namjari_inheritance_documents',
  NAMJARI_FEE = 'namjari_fee',
  NAMJARI_HEARING_NOTIFICATION = 'namjari_hearing_notification',
  NAMJARI_HEARING_DOCUMENTS = 'namjari_hearing_documents',
  NAMJARI_STATUS_CHECK = 'namjari_status_check',
  NAMJARI_REJECTED_APPEAL = 'namjari_rejected_appeal',
  NAMJARI_KHATIAN_COPY = 'namjari_khatian_copy',
  NAMJARI_KHATIAN_CORRECTION = 'namjari_khatian_correction',
  GREETINGS = 'greetings',
  GOODBYE = 'goodbye',
  REPEAT_AGAIN = 'repeat_again',
  AGENT_CALLING = 'agent_calling',
  IRRELEVANT = 'irrelevant', // Conversa fora do escopo de namjari
}

export const INTENT_CATEGORIES: readonly IntentCategory[] = Object.values(IntentCategory);

/**
 * Categoria emitida quando nenhum sinal é confiável (e para queries vazias)
 */
export const DEFAULT_CATEGORY = IntentCategory.IRRELEVANT;

const CATEGORY_VALUES = new Set<string>(INTENT_CATEGORIES);

export function isIntentCategory(value: unknown): value is IntentCategory {
  return typeof value === 'string' && CATEGORY_VALUES.has(value);
}
