/**
 * Tool handlers. Stateless across invocations: every call validates its
 * descriptor, generates a fresh document and returns it whole.
 *
 * Results are a single text block holding
 * `{ success: true, data }` or `{ success: false, error }`.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { DescriptorError, EDGE_LINE_STYLES, LAYOUT_NAMES, NODE_TYPES, PROCESS_VARIANTS } from "./descriptor.js";
import { generateDiagram } from "./generator.js";
import { LAYOUT_DESCRIPTIONS } from "./layout/index.js";
import type { Logger } from "./loggers/console_logger.js";
import { nodeDimensions } from "./styles/node_styles.js";
import { createStyleContext, loadDefaultStyleConfig, type StyleConfig } from "./styles/style_config.js";
import type { ToolArgs, ToolHandlerMap } from "./tool_handler.js";

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  issues?: readonly string[];
}

function successResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: true, data }) }],
  };
}

function errorResult(error: StructuredError): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: false, error }) }],
    isError: true,
  };
}

export interface HandlerOptions {
  logger?: Pick<Logger, "debug" | "warn">;
  /** Resolves the style configuration per call; the shipped file when omitted. */
  styleConfig?: () => StyleConfig;
}

export function createHandlers(options: HandlerOptions = {}): ToolHandlerMap {
  const log = options.logger ?? { debug: () => {}, warn: () => {} };

  return {
    "generate-diagram": (args: ToolArgs): CallToolResult => {
      const { compress, ...descriptor } = args;
      try {
        const styleConfig = options.styleConfig?.();
        const result = generateDiagram(descriptor, {
          compress: compress === true,
          ...(styleConfig ? { styleConfig } : {}),
        });
        for (const note of result.diagnostics) {
          log.warn(`${note.code}: ${note.message}`);
        }
        log.debug(
          `Generated ${result.stats.layout} diagram: ${result.stats.nodes} node(s), ${result.stats.edges} edge(s), ` +
            `${result.stats.pageWidth}x${result.stats.pageHeight}`,
        );
        return successResult({
          diagram_xml: result.xml,
          stats: result.stats,
          diagnostics: result.diagnostics,
        });
      } catch (error) {
        if (error instanceof DescriptorError) {
          return errorResult({
            code: error.code,
            message: error.message,
            issues: error.issues,
            suggestion: "Fix the descriptor and call generate-diagram again. Node ids must be unique and every edge needs 'from' and 'to'.",
          });
        }
        throw error;
      }
    },

    "list-layouts": (): CallToolResult => {
      const layouts = LAYOUT_NAMES.map((name) => ({ name, description: LAYOUT_DESCRIPTIONS[name] }));
      return successResult({ layouts, total: layouts.length });
    },

    "list-node-types": (): CallToolResult => {
      const ctx = createStyleContext(options.styleConfig?.() ?? loadDefaultStyleConfig());
      const nodeTypes = NODE_TYPES.map((type) => {
        const { width, height } = nodeDimensions({ id: type, label: type, type }, ctx);
        return { type, width, height };
      });
      return successResult({
        node_types: nodeTypes,
        process_variants: PROCESS_VARIANTS,
        edge_styles: EDGE_LINE_STYLES,
        edge_colors: Object.keys(ctx.edgeColors),
        detail_extra_height: ctx.detailExtraHeight,
      });
    },
  };
}
