import { logger } from '../../utils/logger.js';
import { EmptyIndexError, InvalidConfigurationError } from '../../utils/errors.js';
import { CharacterMeasure, type TextMeasure } from '../chunking/TextMeasure.js';
import type { Generator } from '../llm/Generator.interface.js';
import { GROUNDED_ANSWER_INSTRUCTION } from '../llm/prompts/grounded-answer.js';
import type { RetrievalResult } from '../vector/VectorIndex.interface.js';
import type { Retriever, RetrieveOptions } from './Retriever.js';

export const CONTEXT_SEPARATOR = '\n\n';

export interface AnsweringOptions {
  maxContextLength: number;
  measure?: TextMeasure;
  instruction?: string;
}

export interface AnswerRequest extends RetrieveOptions {
  k?: number;
}

export interface AnswerResult {
  answer: string;
  context: string;
  fragments: RetrievalResult;
}

/**
 * Joins fragment texts in ranked order, stopping at `maxLength` units. The
 * fragment that crosses the limit is cut at it; later ones are dropped.
 */
export function assembleContext(
  fragments: RetrievalResult,
  maxLength: number,
  measure: TextMeasure = new CharacterMeasure()
): string {
  let context = '';
  let used = 0;

  for (const { fragment } of fragments) {
    const separator = context ? CONTEXT_SEPARATOR : '';
    const remaining = maxLength - used - measure.count(separator);
    if (remaining <= 0) break;

    const length = measure.count(fragment.text);
    if (length <= remaining) {
      context += separator + fragment.text;
      used += measure.count(separator) + length;
      continue;
    }

    context += separator + measure.measure(fragment.text).slice(0, remaining);
    break;
  }

  return context;
}

export class AnsweringPipeline {
  private measure: TextMeasure;
  private instruction: string;

  constructor(
    private retriever: Retriever,
    private generator: Generator,
    private options: AnsweringOptions
  ) {
    if (!Number.isInteger(options.maxContextLength) || options.maxContextLength <= 0) {
      throw new InvalidConfigurationError('maxContextLength must be a positive integer', {
        maxContextLength: options.maxContextLength,
      });
    }
    this.measure = options.measure ?? new CharacterMeasure();
    this.instruction = options.instruction ?? GROUNDED_ANSWER_INSTRUCTION;
  }

  async answer(question: string, request: AnswerRequest = {}): Promise<AnswerResult> {
    const { k, ...retrieveOptions } = request;

    let fragments: RetrievalResult;
    try {
      fragments = await this.retriever.retrieve(question, k, retrieveOptions);
    } catch (error) {
      if (!(error instanceof EmptyIndexError)) {
        throw error;
      }
      logger.warn('Answering against an empty index');
      fragments = [];
    }

    const context = assembleContext(fragments, this.options.maxContextLength, this.measure);
    logger.debug({ fragments: fragments.length, contextLength: context.length }, 'Assembled context');

    const answer = await this.generator.generate(
      { instruction: this.instruction, context, question },
      request.signal
    );

    return { answer, context, fragments };
  }
}
