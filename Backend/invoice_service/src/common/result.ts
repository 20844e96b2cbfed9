/**
 * Résultat d'un appel à une frontière externe (OCR, LLM, stockage).
 * L'échec fait partie de la signature.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
