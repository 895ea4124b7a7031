/**
 * Test Helpers
 *
 * Fixtures, an in-process server and a fake completion client.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Express } from 'express';
import {
  createExtractionContext,
  loadConfig,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
  type Config,
  type ExtractionContext,
} from '@finsheet/shared';

export const ACME_STATEMENT = [
  'ACME INDUSTRIES',
  'Statement of Profit and Loss',
  'Particulars 2024 2023',
  'Revenue from operations 1,000 900',
  'Net profit 150 120',
  'Total assets 5,000 4,500',
].join('\n');

export function makeTempDir(prefix: string = 'finsheet-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Defaults from an empty environment, uploads in the given directory.
 */
export function testConfig(uploadDir: string, overrides: Partial<Config> = {}): Config {
  return { ...loadConfig({}), uploadDir, ...overrides };
}

/**
 * Extraction context from default config, with a fixed correlation ID.
 */
export function testContext(overrides: Partial<ExtractionContext> = {}): ExtractionContext {
  return { ...createExtractionContext(loadConfig({}), 'test-correlation'), ...overrides };
}

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port.
 */
export function startTestServer(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server did not bind a TCP port'));
        return;
      }

      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
    server.on('error', reject);
  });
}

/**
 * POST one file to /api/extract under the given form field.
 */
export async function postDocument(
  baseUrl: string,
  filename: string,
  content: string,
  field: string = 'file'
): Promise<Response> {
  const form = new FormData();
  form.append(field, new Blob([content]), filename);
  return fetch(`${baseUrl}/api/extract`, { method: 'POST', body: form });
}

/**
 * Completion client that records requests and answers from a callback.
 */
export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: (request: CompletionRequest) => Promise<CompletionResponse>) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export function jsonAnswer(content: string): FakeCompletionClient {
  return new FakeCompletionClient(async (request) => ({
    content,
    requestId: 'req_test',
    model: request.model,
  }));
}
