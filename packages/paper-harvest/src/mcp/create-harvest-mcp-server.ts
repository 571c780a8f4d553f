import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { DEFAULT_SOURCE_ORDER } from '../acquisition/types.js';
import type { AppConfig } from '../config.js';
import { HarvestError } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import { SORT_ORDERS } from '../crawl/types.js';
import { ARTICLE_FIELDS, type HarvestService } from '../harvest-service.js';

const toToolResult = (payload: Record<string, unknown>): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  structuredContent: payload
});

export const toToolError = (error: unknown): CallToolResult => {
  const fallbackMessage = 'Unknown paper-harvest error.';

  if (error instanceof HarvestError) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message,
        details: error.details
      }
    };
  }

  if (error instanceof Error) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message
      }
    };
  }

  return {
    isError: true,
    content: [{ type: 'text', text: fallbackMessage }],
    structuredContent: {
      error: 'UnknownError',
      message: fallbackMessage
    }
  };
};

const sourcesSchema = z
  .array(z.enum(DEFAULT_SOURCE_ORDER))
  .min(1)
  .optional()
  .describe(`Ordered source list. Defaults to ${DEFAULT_SOURCE_ORDER.join(', ')}.`);

const requestSchema = z.object({
  title: z.string().optional(),
  doi: z.string().optional(),
  link: z.string().optional()
});

export const createHarvestMcpServer = (config: AppConfig, service: HarvestService, logger: Logger): McpServer => {
  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
      title: 'Paper Harvest',
      description: 'Search, acquire and convert academic papers'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const run = async (tool: string, work: () => Promise<Record<string, unknown>>): Promise<CallToolResult> => {
    try {
      return toToolResult(await work());
    } catch (error) {
      logger.warn('Tool call failed', { tool, error: describeError(error) });
      return toToolError(error);
    }
  };

  server.registerTool(
    'search_articles',
    {
      title: 'Search Articles',
      description:
        'Search the article database by keyword and optionally enrich each result from its detail page. ' +
        'Stops enriching, but still returns every row, when the site presents a verification page.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: {
        keyword: z.string().min(1).describe('Search keyword.'),
        max_results: z.number().int().min(1).max(500).optional().describe('Maximum number of results.'),
        sort_order: z.enum(SORT_ORDERS).default('relevance'),
        get_details: z.boolean().default(true).describe('Fetch abstract, keywords, DOI and organization.'),
        fields: z.array(z.enum(ARTICLE_FIELDS)).optional().describe('Restrict each record to these fields.'),
        export_path: z.string().optional().describe('Also write the records to this .json or .csv file.')
      }
    },
    async ({ keyword, max_results, sort_order, get_details, fields, export_path }) =>
      run('search_articles', async () => {
        const articles = await service.searchArticles({
          keyword,
          maxResults: max_results,
          sortOrder: sort_order,
          getDetails: get_details,
          fields,
          exportPath: export_path
        });
        return { keyword, count: articles.length, articles };
      })
  );

  server.registerTool(
    'get_article_info',
    {
      title: 'Get Article Info',
      description: 'Return one search result, by zero-based index, enriched from its detail page.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: {
        keyword: z.string().min(1),
        index: z.number().int().min(0).default(0),
        sort_order: z.enum(SORT_ORDERS).default('relevance')
      }
    },
    async ({ keyword, index, sort_order }) =>
      run('get_article_info', async () => ({
        keyword,
        index,
        article: await service.getArticleInfo(keyword, index, sort_order)
      }))
  );

  server.registerTool(
    'acquire_document',
    {
      title: 'Acquire Document',
      description:
        'Download the PDF of one article by trying each applicable source in order until one yields a ' +
        'verified PDF. Requires a title or a DOI; a link on the article site enables the direct source.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true
      },
      inputSchema: {
        title: z.string().optional(),
        doi: z.string().optional(),
        link: z.string().optional().describe('Detail page link on the article site.'),
        sources: sourcesSchema
      }
    },
    async ({ title, doi, link, sources }) =>
      run('acquire_document', async () => ({
        result: await service.acquire({ title, doi, link }, sources)
      }))
  );

  server.registerTool(
    'acquire_documents',
    {
      title: 'Acquire Documents',
      description: 'Acquire several documents one at a time, pausing between items.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true
      },
      inputSchema: {
        requests: z.array(requestSchema).min(1).max(200),
        sources: sourcesSchema,
        stop_on_failure: z.boolean().default(false)
      }
    },
    async ({ requests, sources, stop_on_failure }) =>
      run('acquire_documents', async () => {
        const results = await service.acquireBatch(requests, sources, stop_on_failure);
        return {
          requested: requests.length,
          processed: results.length,
          succeeded: results.filter((result) => result.success).length,
          results
        };
      })
  );

  server.registerTool(
    'search_and_acquire',
    {
      title: 'Search and Acquire',
      description: 'Search with details, then acquire the PDF of every result.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true
      },
      inputSchema: {
        keyword: z.string().min(1),
        max_results: z.number().int().min(1).max(100).default(10),
        sort_order: z.enum(SORT_ORDERS).default('relevance'),
        sources: sourcesSchema
      }
    },
    async ({ keyword, max_results, sort_order, sources }) =>
      run('search_and_acquire', async () => {
        const { articles, downloads } = await service.searchAndAcquire(keyword, max_results, sort_order, sources);
        return { keyword, articles, downloads };
      })
  );

  server.registerTool(
    'classify_document',
    {
      title: 'Classify Document',
      description: 'Sample the first pages of a PDF and report whether its text layer is usable.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        path: z.string().min(1).describe('Local PDF path.')
      }
    },
    async ({ path }) => run('classify_document', async () => ({ report: await service.classify(path) }))
  );

  server.registerTool(
    'convert_document',
    {
      title: 'Convert Document',
      description:
        'Convert a PDF to Markdown. The backend is chosen from the document classification unless one is forced.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true
      },
      inputSchema: {
        path: z.string().min(1).describe('Local PDF path.'),
        output_dir: z.string().optional().describe('Defaults to the directory of the PDF.'),
        backend: z.string().optional().describe('Force a registered backend, e.g. pdf-text or vision-ocr.')
      }
    },
    async ({ path, output_dir, backend }) =>
      run('convert_document', async () => ({
        outcome: await service.convert(path, { outputDir: output_dir, backend })
      }))
  );

  return server;
};
