import { ValidationError } from 'class-validator';

/**
 * Achata erros do class-validator (inclusive aninhados) em mensagens "caminho: restrição"
 */
export function flattenValidationErrors(errors: readonly ValidationError[], parentPath = ''): string[] {
  const messages: string[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      for (const message of Object.values(error.constraints)) {
        messages.push(`${path}: ${message}`);
      }
    }

    if (error.children && error.children.length > 0) {
      messages.push(...flattenValidationErrors(error.children, path));
    }
  }

  return messages;
}
