/**
 * Model-Assisted Extractor Tests
 *
 * Prompt construction, response parsing and error mapping, with a fake
 * completion client in place of the OpenAI API.
 */

import {
  ModelAssistedExtractor,
  OpenAiCompletionClient,
  FINANCIAL_STATEMENT_TEMPLATE,
  loadConfig,
  buildUserPrompt,
  parseModelResponse,
  isAppError,
  getExtractorOrThrow,
} from '@finsheet/shared';
import { FakeCompletionClient, jsonAnswer, testContext } from './helpers';

const ctx = testContext({ openaiApiKey: 'test-secret' });

const PROMPT_PREFIX = 'Extract financial statement data from this document.\n\nDOCUMENT TEXT:\n';

describe('Model-Assisted Extractor', () => {
  describe('buildUserPrompt', () => {
    it('should send at most the configured number of characters', () => {
      const maxChars = loadConfig({}).llmMaxDocumentChars;
      const prompt = buildUserPrompt(FINANCIAL_STATEMENT_TEMPLATE, 'x'.repeat(9000), maxChars);
      expect(maxChars).toBe(8000);
      expect(prompt).toBe(PROMPT_PREFIX + 'x'.repeat(8000));
    });

    it('should insert text containing replacement patterns literally', () => {
      const prompt = buildUserPrompt(FINANCIAL_STATEMENT_TEMPLATE, 'Revenue $& 100 $1', 8000);
      expect(prompt).toBe(PROMPT_PREFIX + 'Revenue $& 100 $1');
    });
  });

  describe('parseModelResponse', () => {
    it('should normalise a well-formed answer', () => {
      const record = parseModelResponse(
        JSON.stringify({
          company_name: 'Globex CORPORATION',
          fiscal_years: [2025, '2024', 2023, 2022],
          financial_data: {
            revenue: { '2025': 2500, '2024': null },
            ebitda: { '2025': 10 },
            net_income: { '2024': null },
          },
          currency: 'USD',
          units: 'Thousands',
          notes: ['Restated'],
        })
      );

      expect(record).toEqual({
        company_name: 'Globex CORPORATION',
        fiscal_years: ['2025', '2024', '2023'],
        financial_data: { revenue: { '2025': 2500 } },
        currency: 'USD',
        units: 'Thousands',
        notes: ['Restated'],
      });
    });

    it('should drop unrecognised line items of any shape', () => {
      const record = parseModelResponse(
        '{"financial_data": {"revenue": {"2024": 1}, "ebitda": 5, "segments": ["retail"], "other": null}}'
      );

      expect(record.financial_data).toEqual({ revenue: { '2024': 1 } });
    });

    it('should apply defaults to an empty object', () => {
      expect(parseModelResponse('{}')).toEqual({
        company_name: 'Unknown',
        fiscal_years: [],
        financial_data: {},
        currency: 'Unknown',
        units: 'Actual',
        notes: [],
      });
    });

    it('should reject an answer wrapped in markdown fences', () => {
      expect(() => parseModelResponse('```json\n{}\n```')).toThrow(/^Failed to parse financial data: /);
    });

    it('should reject an answer of the wrong shape', () => {
      let caught: unknown;
      try {
        parseModelResponse('{"financial_data": {"revenue": 5}}');
      } catch (error) {
        caught = error;
      }

      expect(isAppError(caught)).toBe(true);
      expect(caught).toMatchObject({
        code: 'extraction_failed',
        statusCode: 400,
        message: 'Failed to parse financial data: /financial_data/revenue: must be object',
      });
    });
  });

  describe('ModelAssistedExtractor', () => {
    it('should be registered under the model_assisted strategy', () => {
      expect(getExtractorOrThrow('model_assisted')).toBeInstanceOf(ModelAssistedExtractor);
    });

    it('should send the template prompts with the configured defaults', async () => {
      const client = jsonAnswer('{"company_name": "Globex CORPORATION"}');
      const extractor = new ModelAssistedExtractor(client);

      const result = await extractor.extract('Globex CORPORATION annual report', ctx);

      expect(client.requests).toHaveLength(1);
      expect(client.requests[0]).toEqual({
        systemPrompt: FINANCIAL_STATEMENT_TEMPLATE.systemPrompt,
        userPrompt: PROMPT_PREFIX + 'Globex CORPORATION annual report',
        model: 'gpt-4o-mini',
        maxTokens: 2000,
        timeoutMs: 60000,
        apiKey: 'test-secret',
      });
      expect(result.extractionMethod).toBe('model_assisted');
      expect(result.record.company_name).toBe('Globex CORPORATION');
      expect(result.metadata.model).toBe('gpt-4o-mini');
      expect(result.metadata.requestId).toBe('req_test');
    });

    it('should honour limits from the extraction context', async () => {
      const client = jsonAnswer('{}');
      const extractor = new ModelAssistedExtractor(client);

      await extractor.extract('0123456789abcdef', {
        ...ctx,
        extractionModel: 'test-model',
        maxDocumentChars: 10,
        maxTokens: 500,
        timeoutMs: 1000,
        openaiApiKey: 'test-secret',
      });

      expect(client.requests[0]).toMatchObject({
        userPrompt: PROMPT_PREFIX + '0123456789',
        model: 'test-model',
        maxTokens: 500,
        timeoutMs: 1000,
        apiKey: 'test-secret',
      });
    });

    it('should report a failed model call as a service error', async () => {
      const client = new FakeCompletionClient(async () => {
        throw new Error('boom');
      });
      const extractor = new ModelAssistedExtractor(client);

      await expect(extractor.extract('some text', ctx)).rejects.toMatchObject({
        code: 'service_error',
        statusCode: 400,
        message: 'Model API error: boom',
      });
    });

    it('should refuse to call OpenAI without a configured API key', async () => {
      const extractor = new ModelAssistedExtractor(new OpenAiCompletionClient());

      await expect(extractor.extract('some text', testContext({ openaiApiKey: '' }))).rejects.toMatchObject({
        code: 'service_error',
        message: 'Model API error: OPENAI_API_KEY is not configured',
      });
    });

    it('should report an empty answer as a service error', async () => {
      const extractor = new ModelAssistedExtractor(jsonAnswer(''));

      await expect(extractor.extract('some text', ctx)).rejects.toMatchObject({
        code: 'service_error',
        message: 'Model API error: Empty response from model',
      });
    });

    it('should pass parse failures through unchanged', async () => {
      const extractor = new ModelAssistedExtractor(jsonAnswer('not json'));

      await expect(extractor.extract('some text', ctx)).rejects.toMatchObject({
        code: 'extraction_failed',
      });
    });
  });
});
