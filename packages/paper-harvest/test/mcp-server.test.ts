import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HarvestError } from '../src/core/errors.js';
import { immediatePacer } from '../src/core/pacing.js';
import { HarvestService } from '../src/harvest-service.js';
import { createHarvestMcpServer, toToolError } from '../src/mcp/create-harvest-mcp-server.js';
import { createFakeDriverFactory } from './support/fake-page-driver.js';
import { SEARCH_URL, fixture, routeFetch, silentLogger, testConfig } from './support/helpers.js';

const logger = silentLogger();

let workDir: string;
let client: Client;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'mcp-test-'));
  const config = testConfig({ ACQUIRE_DOWNLOAD_DIR: join(workDir, 'downloads') });
  const service = new HarvestService(config, logger, {
    createDriver: createFakeDriverFactory((url) =>
      url.startsWith(SEARCH_URL) ? fixture('search-results.html') : fixture('detail-page.html')
    ).factory,
    fetchImpl: routeFetch({}),
    pacer: immediatePacer()
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createHarvestMcpServer(config, service, logger).connect(serverTransport);
  client = new Client({ name: 'mcp-test', version: '1.0.0' });
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await rm(workDir, { recursive: true, force: true });
});

describe('harvest MCP server', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'acquire_document',
      'acquire_documents',
      'classify_document',
      'convert_document',
      'get_article_info',
      'search_and_acquire',
      'search_articles'
    ]);
  });

  it('returns search results as structured content', async () => {
    const result = await client.callTool({
      name: 'search_articles',
      arguments: { keyword: '图像识别', max_results: 1, get_details: false, fields: ['title', 'downloadCount'] }
    });

    expect(result.isError).toBeFalsy();
    expect(result.structuredContent).toEqual({
      keyword: '图像识别',
      count: 1,
      articles: [{ title: '图像识别方法综述', downloadCount: 340 }]
    });
  });

  it('reports an unusable acquisition request as a failed result', async () => {
    const result = await client.callTool({ name: 'acquire_document', arguments: { link: 'https://kns.example.org/x' } });

    expect(result.structuredContent).toEqual({
      result: { success: false, message: 'A title or a DOI is required.', attempts: [] }
    });
  });

  it('turns service errors into tool errors', async () => {
    const result = await client.callTool({ name: 'search_articles', arguments: { keyword: '   ' } });

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      error: 'HarvestError',
      message: 'Search keyword must not be empty.'
    });
  });
});

describe('toToolError', () => {
  it('carries the details of a harvest error', () => {
    expect(toToolError(new HarvestError('index must be a non-negative integer.', { index: -1 }))).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'index must be a non-negative integer.' }],
      structuredContent: {
        error: 'HarvestError',
        message: 'index must be a non-negative integer.',
        details: { index: -1 }
      }
    });
  });

  it('falls back for thrown non-errors', () => {
    expect(toToolError('boom').structuredContent).toEqual({
      error: 'UnknownError',
      message: 'Unknown paper-harvest error.'
    });
  });
});
