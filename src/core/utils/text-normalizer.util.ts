/**
 * Utilitários de normalização e tokenização de texto (bengali + latim)
 *
 * Sinais vocálicos bengalis (matras) são letras combinantes que carregam
 * significado, então só os diacríticos latinos (U+0300–U+036F) são removidos.
 */

const LATIN_DIACRITICS = /[\u0300-\u036f]/g;
const TOKEN_SEPARATOR = /[^\p{L}\p{M}\p{N}]+/u;
const MIN_TOKEN_LENGTH = 2; // Mesmo critério de \w\w+

/**
 * Normalização Unicode sem alterar caixa ou espaços.
 * Usada também na fonte das regex para que padrão e query fiquem na mesma forma.
 */
export function normalizeUnicode(text: string): string {
  return text.normalize('NFD').replace(LATIN_DIACRITICS, '').normalize('NFC');
}

/**
 * Normaliza query: Unicode (NFC, sem diacríticos latinos), lowercase, espaços colapsados, trim.
 * Idempotente.
 */
export function normalizeQuery(text: string): string {
  return normalizeUnicode(text).toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Tokeniza texto já normalizado em sequências de letras/marcas/dígitos
 */
export function tokenize(text: string): string[] {
  return text.split(TOKEN_SEPARATOR).filter((token) => token.length >= MIN_TOKEN_LENGTH);
}

/**
 * Gera n-gramas de palavras (unidos por espaço) no intervalo [min, max]
 */
export function buildNgrams(tokens: readonly string[], [min, max]: readonly [number, number]): string[] {
  const ngrams: string[] = [];

  for (let n = min; n <= max; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      ngrams.push(tokens.slice(i, i + n).join(' '));
    }
  }

  return ngrams;
}

/**
 * Limpeza de perguntas vindas de datasets gerados: remove numeração inicial ("12. ", "3) "),
 * aspas envolventes e espaços extras
 */
export function cleanQuestion(text: string): string {
  return text
    .trim()
    .replace(/^\d+\s*[.)]\s*/, '')
    .replace(/^["'“”‘’]+|["'“”‘’]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}
