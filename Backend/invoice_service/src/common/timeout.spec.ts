import { CompletionFailure } from '../providers/completion.provider';
import { fail, ok, Result } from './result';
import { withTimeout } from './timeout';

describe('withTimeout', () => {
  it('renvoie le résultat obtenu à temps', async () => {
    await expect(withTimeout(Promise.resolve(ok('done')), 1000)).resolves.toEqual(ok('done'));
  });

  it('transmet un échec du fournisseur', async () => {
    const failure: CompletionFailure = { kind: 'empty', message: 'Réponse vide' };

    await expect(withTimeout(Promise.resolve(fail(failure)), 1000)).resolves.toEqual(
      fail(failure),
    );
  });

  it('échoue après le délai', async () => {
    const pending = new Promise<Result<string, CompletionFailure>>(() => undefined);

    await expect(withTimeout(pending, 10)).resolves.toEqual(
      fail({ kind: 'timeout', message: 'Aucune réponse du fournisseur après 10 ms' }),
    );
  });

  it('convertit un rejet en échec de transport', async () => {
    const rejected = Promise.reject(new Error('socket hang up'));

    await expect(withTimeout(rejected, 1000)).resolves.toEqual(
      fail({ kind: 'transport', message: 'socket hang up' }),
    );
  });
});
