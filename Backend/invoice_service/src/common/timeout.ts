import { CompletionFailure } from '../providers/completion.provider';
import { getErrorMessage } from './errors';
import { fail, Result } from './result';

/**
 * Borne la durée d'un appel fournisseur. Un rejet inattendu est converti
 * en échec de transport.
 */
export async function withTimeout<T>(
  task: Promise<Result<T, CompletionFailure>>,
  timeoutMs: number,
): Promise<Result<T, CompletionFailure>> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<Result<T, CompletionFailure>>((resolve) => {
    timer = setTimeout(() => {
      resolve(
        fail({
          kind: 'timeout',
          message: `Aucune réponse du fournisseur après ${timeoutMs} ms`,
        }),
      );
    }, timeoutMs);
  });

  const guarded = task.catch((error: unknown) =>
    fail<CompletionFailure>({
      kind: 'transport',
      message: getErrorMessage(error),
    }),
  );

  try {
    return await Promise.race([guarded, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
