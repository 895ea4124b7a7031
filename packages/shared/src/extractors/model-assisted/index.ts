/**
 * Model-Assisted Extractor
 *
 * Sends the first few thousand characters of the document to a language model
 * with the financial-statement template and parses the JSON it returns.
 * No retry, no streaming, no partial results.
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, ExtractorResult, ExtractionStrategy } from '../types';
import {
  OpenAiCompletionClient,
  buildUserPrompt,
  parseModelResponse,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
} from '../llm-extraction';
import { FINANCIAL_STATEMENT_TEMPLATE } from '../../templates/financial-statement.template';
import type { ExtractionTemplate } from '../../templates/types';
import { AppError, errorMessage } from '../../errors';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../../metrics';
import { logger } from '../../logger';

export class ModelAssistedExtractor extends BaseExtractor {
  readonly strategy: ExtractionStrategy = 'model_assisted';
  readonly description = 'Language-model extraction with a fixed JSON prompt contract';

  private readonly client: CompletionClient;
  private readonly template: ExtractionTemplate;

  constructor(
    client: CompletionClient = new OpenAiCompletionClient(),
    template: ExtractionTemplate = FINANCIAL_STATEMENT_TEMPLATE
  ) {
    super();
    this.client = client;
    this.template = template;
  }

  protected async extractRecord(text: string, ctx: ExtractionContext): Promise<ExtractorResult> {
    const model = ctx.extractionModel;
    const maxChars = ctx.maxDocumentChars;
    const userPrompt = buildUserPrompt(this.template, text, maxChars);

    logger.info('Extracting financial data with LLM template', {
      model,
      template: this.template.name,
      text_length: text.length,
      prompt_text_length: Math.min(text.length, maxChars),
    });

    const response = await this.requestCompletion({
      systemPrompt: this.template.systemPrompt,
      userPrompt,
      model,
      maxTokens: ctx.maxTokens,
      timeoutMs: ctx.timeoutMs,
      apiKey: ctx.openaiApiKey,
    });

    const record = parseModelResponse(response.content);

    return {
      record,
      extractionMethod: 'model_assisted',
      metadata: {
        model: response.model,
        requestId: response.requestId,
      },
    };
  }

  /**
   * Call the model; every failure of the call itself is a 'service_error'.
   */
  private async requestCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    const startTime = Date.now();

    try {
      const response = await this.client.complete(request);

      if (!response.content) {
        throw new Error('Empty response from model');
      }

      llmRequestDurationHistogram.observe({ model: request.model }, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ model: request.model, status: 'success' });

      return response;
    } catch (error) {
      llmRequestDurationHistogram.observe({ model: request.model }, (Date.now() - startTime) / 1000);
      llmRequestsCounter.inc({ model: request.model, status: 'error' });

      logger.error('LLM request failed', error, { model: request.model });

      throw new AppError('service_error', `Model API error: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export const modelAssistedExtractor = new ModelAssistedExtractor();
