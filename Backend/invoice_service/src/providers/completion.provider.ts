import { ProviderName } from '../config/configuration';
import { Result } from '../common/result';

export type CompletionFailureKind =
  | 'transport'
  | 'blocked'
  | 'empty'
  | 'timeout'
  | 'configuration';

export interface CompletionFailure {
  kind: CompletionFailureKind;
  message: string;
}

/**
 * Capacité de génération de texte, indépendante du fournisseur.
 */
export interface CompletionProvider {
  readonly name: ProviderName;
  generate(
    systemInstruction: string,
    prompt: string,
  ): Promise<Result<string, CompletionFailure>>;
  listModels(): Promise<Result<string[], CompletionFailure>>;
  isAvailable(): Promise<boolean>;
}
