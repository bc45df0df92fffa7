import { TtlCache } from '../cache/ttlCache';
import { errorMessage, logInfo, logWarn } from '../observability/logger';
import { AdviceError } from '../types/errors';
import { PlanetRecord } from '../types/planet';
import { Result, fail, ok } from '../types/result';
import { buildPlanetPrompt, buildQuestionPrompt } from './prompts';
import { TextGenerator } from './textGenerator';

export interface AdvisorServiceOptions {
  /** Null when no API key is configured; every call then answers with an AdviceError. */
  generator: TextGenerator | null;
  cache: TtlCache<string>;
}

export interface AdviceOptions {
  requestId?: string;
}

export class AdvisorService {
  private readonly generator: TextGenerator | null;
  private readonly cache: TtlCache<string>;

  constructor(options: AdvisorServiceOptions) {
    this.generator = options.generator;
    this.cache = options.cache;
  }

  async ask(question: string, options?: AdviceOptions): Promise<Result<string, AdviceError>> {
    if (!question.trim()) {
      return fail(new AdviceError('La question est vide'));
    }
    return this.complete(buildQuestionPrompt(question), 'ask', options?.requestId);
  }

  async explain(record: PlanetRecord, options?: AdviceOptions): Promise<Result<string, AdviceError>> {
    return this.complete(buildPlanetPrompt(record), 'explain', options?.requestId);
  }

  private async complete(prompt: string, kind: string, requestId?: string): Promise<Result<string, AdviceError>> {
    const cached = await this.cache.get(prompt);
    if (cached) {
      logInfo('advisor_cache_hit', { kind, requestId });
      return ok(cached.value);
    }

    if (!this.generator) {
      return fail(new AdviceError('Assistant IA indisponible: aucune clé API configurée'));
    }

    const started = Date.now();
    let text: string;
    try {
      text = await this.generator.generate(prompt);
    } catch (err) {
      logWarn('advisor_request_failed', { kind, model: this.generator.model, requestId, error: errorMessage(err) });
      return fail(new AdviceError(`Erreur de l'assistant IA: ${errorMessage(err)}`, err));
    }

    if (!text.trim()) {
      logWarn('advisor_empty_response', { kind, model: this.generator.model, requestId });
      return fail(new AdviceError("L'assistant IA n'a renvoyé aucune réponse"));
    }

    await this.cache.set(prompt, text);
    logInfo('advisor_response', {
      kind,
      model: this.generator.model,
      responseTimeMs: Date.now() - started,
      requestId
    });
    return ok(text);
  }
}
