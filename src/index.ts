#!/usr/bin/env node

/**
 * eBay Seller Orders MCP Server
 *
 * MCP server for extracting order lines from eBay Seller Hub across one or
 * more seller accounts and exporting them to CSV.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { EbaySellerPlugin } from "./ebay/adapter";
import { getStatusCodes } from "./ebay/statuses";
import {
  ConfigError,
  loadConfig,
  resolveRunSettings,
  selectSources,
  type RunOverrides,
  type RunSettings,
} from "./core/config";
import { closeAllSessions, getSession } from "./core/browser/session";
import { loadDocument } from "./core/dom/cheerio-document";
import { createDebugLogger } from "./core/utils/debug";
import {
  exportOrderLinesCSV,
  fetchSellerOrders,
  formatDatasetTable,
  getOutputPath,
  type FetchOrdersResult,
  type SnapshotProvider,
} from "./tools";

const debug = createDebugLogger("server");

const ebayPlugin = new EbaySellerPlugin();

const fetchArgsSchema = z.object({
  status: z.string().optional(),
  sources: z.array(z.string()).optional(),
  max_items: z.number().int().positive().optional(),
  keywords: z.array(z.string()).optional(),
  filter_enabled: z.boolean().optional(),
  parallel: z.boolean().optional(),
});

const exportArgsSchema = fetchArgsSchema.extend({
  output_path: z.string().optional(),
  sort: z.boolean().optional(),
});

const authArgsSchema = z.object({
  source: z.string().optional(),
});

type FetchArgs = z.infer<typeof fetchArgsSchema>;

type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function jsonResponse(body: unknown, isError = false): ToolResponse {
  const response: ToolResponse = {
    content: [{ type: "text", text: JSON.stringify(body, null, 2) }],
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}

function toOverrides(args: FetchArgs): RunOverrides {
  return {
    status: args.status,
    sources: args.sources,
    maxItems: args.max_items,
    keywords: args.keywords,
    filterEnabled: args.filter_enabled,
    parallel: args.parallel,
  };
}

/**
 * Snapshot provider backed by one persistent browser profile per account.
 */
function createBrowserProvider(headless: boolean): SnapshotProvider {
  return async (source, status) => {
    const session = getSession({
      label: source.label,
      userDataDir: source.profileDir,
      headless,
    });
    const snapshot = await ebayPlugin.captureOrdersPage(session, status);
    return loadDocument(snapshot.html, snapshot.url);
  };
}

async function runFetch(
  settings: RunSettings,
  progressToken: string | number | undefined,
): Promise<FetchOrdersResult> {
  const result = await fetchSellerOrders(
    {
      status: settings.status,
      sources: settings.sources,
      maxItems: settings.maxItems,
      contentFilter: settings.contentFilter,
      parallel: settings.parallel,
      onProgress: (message, current, total) => {
        void sendProgress(progressToken, current, total, message);
      },
    },
    createBrowserProvider(settings.headless),
  );

  // Console rendering; stdout is reserved for the transport
  const table = formatDatasetTable(result.dataset);
  if (table) {
    console.error(table);
  }
  return result;
}

function summarizeSources(result: FetchOrdersResult) {
  return result.sources.map((s) => ({
    source: s.source,
    recordCount: s.records.length,
    stats: s.stats,
    errors: s.errors,
  }));
}

// Define MCP tools
const sharedFetchProperties = {
  status: {
    type: "string",
    description: `Order status filter. Supported: ${getStatusCodes().join(", ")}. Defaults to the configured status (awaiting_shipment).`,
    enum: getStatusCodes(),
  },
  sources: {
    type: "array",
    items: { type: "string" },
    description:
      "Labels of the configured seller accounts to scrape. Defaults to all configured accounts.",
  },
  max_items: {
    type: "number",
    description:
      "Maximum number of order lines per account. Extraction stops once reached (default: 500).",
  },
  keywords: {
    type: "array",
    items: { type: "string" },
    description:
      "Keep only items whose title contains one of these words (whole word, case-insensitive). Passing keywords enables the filter.",
  },
  filter_enabled: {
    type: "boolean",
    description:
      "Turn the keyword filter on or off, overriding the configuration.",
  },
  parallel: {
    type: "boolean",
    description:
      "Scrape accounts concurrently, one browser per account profile.",
  },
};

const tools: Tool[] = [
  {
    name: "get_seller_orders",
    description:
      "Fetch order lines from eBay Seller Hub for one or more seller accounts. Returns per-account statistics, the merged columns and rows (source, order number, full order number, item ID, title, item URL, quantity sold, quantity available, price, price text), and a plain-text table.",
    inputSchema: {
      type: "object",
      properties: sharedFetchProperties,
    },
  },
  {
    name: "export_seller_orders_csv",
    description:
      "Export eBay Seller Hub order lines for one or more seller accounts to a CSV file. Defaults to ~/Downloads/ebay-orders-{status}-{date}.csv. Prices are written with two decimals; missing values are empty.",
    inputSchema: {
      type: "object",
      properties: {
        ...sharedFetchProperties,
        output_path: {
          type: "string",
          description: "Full path to save CSV file.",
        },
        sort: {
          type: "boolean",
          description:
            "Sort rows by order number, then item ID (blank values last). Default keeps page order.",
          default: false,
        },
      },
    },
  },
  {
    name: "check_seller_auth_status",
    description:
      "Check whether a configured seller account is logged in to eBay. Opens the browser profile for that account.",
    inputSchema: {
      type: "object",
      properties: {
        source: {
          type: "string",
          description: "Account label. Defaults to the first configured account.",
        },
      },
    },
  },
  {
    name: "list_seller_sources",
    description:
      "List the configured seller accounts, their browser profile directories, and the supported order status filters.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

// Create MCP server
const server = new Server(
  {
    name: "ebay-seller-orders-mcp",
    version: "0.1.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

/**
 * Send progress notification to client.
 */
async function sendProgress(
  progressToken: string | number | undefined,
  progress: number,
  total: number,
  message: string,
): Promise<void> {
  if (progressToken === undefined) return;

  try {
    await server.notification({
      method: "notifications/progress",
      params: {
        progressToken,
        progress,
        total,
        message,
      },
    });
  } catch (e) {
    // Progress notifications are optional, don't fail on errors
    debug(`Failed to send progress: ${e}`);
  }
}

// Handle list tools request
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const progressToken = request.params._meta?.progressToken;

  try {
    switch (name) {
      case "get_seller_orders": {
        const parsed = fetchArgsSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return jsonResponse(
            { error: "Invalid arguments", issues: parsed.error.issues, receivedArgs: args },
            true,
          );
        }

        const settings = resolveRunSettings(loadConfig(), toOverrides(parsed.data));
        const result = await runFetch(settings, progressToken);

        return jsonResponse({
          status: result.errors.length === 0 ? "success" : "partial",
          params: {
            status: settings.status,
            sources: settings.sources.map((s) => s.label),
            maxItems: settings.maxItems,
            contentFilter: settings.contentFilter,
            parallel: settings.parallel,
          },
          totalRecords: result.dataset.rows.length,
          sources: summarizeSources(result),
          errors: result.errors,
          columns: result.dataset.columns,
          rows: result.dataset.rows,
          table: formatDatasetTable(result.dataset),
        });
      }

      case "export_seller_orders_csv": {
        const parsed = exportArgsSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return jsonResponse(
            { error: "Invalid arguments", issues: parsed.error.issues, receivedArgs: args },
            true,
          );
        }

        const settings = resolveRunSettings(loadConfig(), toOverrides(parsed.data));
        const outputPath = getOutputPath(parsed.data.output_path, settings.status);
        const result = await runFetch(settings, progressToken);

        const exportResult = await exportOrderLinesCSV(result.dataset, outputPath, {
          sort: parsed.data.sort,
        });

        return jsonResponse(
          {
            status: exportResult.success ? "success" : "error",
            params: {
              status: settings.status,
              sources: settings.sources.map((s) => s.label),
              maxItems: settings.maxItems,
              outputPath,
              sort: parsed.data.sort ?? false,
            },
            filePath: exportResult.filePath,
            rowCount: exportResult.rowCount,
            columns: result.dataset.columns,
            error: exportResult.error,
            sources: summarizeSources(result),
            fetchErrors: result.errors,
          },
          !exportResult.success,
        );
      }

      case "check_seller_auth_status": {
        const parsed = authArgsSchema.safeParse(args ?? {});
        if (!parsed.success) {
          return jsonResponse(
            { error: "Invalid arguments", issues: parsed.error.issues, receivedArgs: args },
            true,
          );
        }

        const config = loadConfig();
        const [source] = selectSources(
          config,
          parsed.data.source ? [parsed.data.source] : undefined,
        );
        const session = getSession({
          label: source.label,
          userDataDir: source.profileDir,
          headless: config.headless,
        });
        const page = await session.getPage();
        const authStatus = await ebayPlugin.checkAuthStatus(page, source.label);

        return jsonResponse({
          status: authStatus.authenticated ? "success" : "error",
          params: { source: source.label },
          authenticated: authStatus.authenticated,
          url: authStatus.url,
          message: authStatus.message,
          loginUrl: authStatus.authenticated ? undefined : ebayPlugin.getLoginUrl(),
        });
      }

      case "list_seller_sources": {
        const config = loadConfig();
        return jsonResponse({
          status: "success",
          defaultStatus: config.status,
          maxItems: config.maxItems,
          contentFilter: config.contentFilter,
          sources: config.sources,
          statuses: ebayPlugin.statusFilters.map((s) => ({
            code: s.code,
            label: s.label,
            url: ebayPlugin.getOrdersUrl(s.code),
          })),
        });
      }

      default:
        return jsonResponse({ error: `Unknown tool: ${name}` }, true);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      return jsonResponse({ error: error.message, configPath: error.path }, true);
    }
    return jsonResponse({ error: String(error) }, true);
  }
});

async function shutdown(): Promise<void> {
  try {
    await closeAllSessions();
  } catch (e) {
    debug(`Error closing browsers: ${e}`);
  }
  process.exit(0);
}

// Cleanup on exit
process.on("SIGINT", () => {
  void shutdown();
});

process.on("SIGTERM", () => {
  void shutdown();
});

// Main entry point
async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  debug("eBay Seller Orders MCP server running");
}

main().catch((error) => {
  debug(`Fatal: ${error}`);
  process.exit(1);
});
