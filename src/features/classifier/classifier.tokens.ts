/**
 * Tokens de injeção do classificador
 *
 * Os tokens de embeddings e do índice vetorial ficam junto das interfaces em infrastructure/.
 */
export const PATTERN_RULE_SET = 'PATTERN_RULE_SET';
export const CLASSIFIER_OPTIONS = 'CLASSIFIER_OPTIONS';
