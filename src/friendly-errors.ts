/**
 * Friendly error messages for parse and validation diagnostics.
 *
 * Maps diagnostic codes to plain explanations with contextual details
 * extracted from the original message.
 */

export interface TFriendlyError {
  /** Short title (3-5 words) */
  title: string;
  /** Contextual explanation with tool ids from the error */
  explanation: string;
  /** Actionable suggestion for fixing the issue */
  fix: string;
  /** Original diagnostic code */
  code: string;
}

interface DiagnosticError {
  code: string;
  message: string;
  node?: string;
}

// ── Helpers to extract contextual info from error messages ──────────────

function extractQuoted(message: string): string[] {
  const matches = message.match(/"([^"]+)"/g);
  return matches ? matches.map((m) => m.replace(/"/g, '')) : [];
}

function extractNodeList(message: string): string | null {
  const match = message.match(/:\s*([^:]+)$/);
  return match ? match[1].trim() : null;
}

// ── Error code mappings ────────────────────────────────────────────────

type ErrorMapper = (error: DiagnosticError) => TFriendlyError;

const errorMappers: Record<string, ErrorMapper> = {
  DOCUMENT_MALFORMED(error) {
    return {
      title: 'Malformed Document',
      explanation: `The file is not well-formed XML: ${error.message}`,
      fix: 'Open the workflow in its editor and save it again, or repair the XML at the reported line.',
      code: error.code,
    };
  },

  DUPLICATE_NODE_ID(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    return {
      title: 'Duplicate Tool ID',
      explanation: `Two tools share the id '${toolId}'. Only the first one was kept.`,
      fix: `Give the second tool with id '${toolId}' a unique ToolID.`,
      code: error.code,
    };
  },

  DANGLING_CONNECTION(error) {
    const quoted = extractQuoted(error.message);
    const from = quoted[0] || 'unknown';
    const to = quoted[1] || 'unknown';
    return {
      title: 'Dangling Connection',
      explanation: `The connection from '${from}' to '${to}' points at a tool that is not in the workflow, so it was ignored.`,
      fix: 'Remove the connection, or restore the tool it refers to.',
      code: error.code,
    };
  },

  DUPLICATE_CONNECTION(error) {
    const quoted = extractQuoted(error.message);
    return {
      title: 'Duplicate Connection',
      explanation: `Tools '${quoted[0] || 'unknown'}' and '${quoted[1] || 'unknown'}' are connected more than once through the same port.`,
      fix: 'Delete the extra connection.',
      code: error.code,
    };
  },

  CYCLIC_GRAPH(error) {
    const nodes = extractNodeList(error.message);
    return {
      title: 'Circular Dependency',
      explanation: nodes
        ? `Tools ${nodes} depend on each other in a loop, so no order can run them. They are left out of the generated script.`
        : 'Some tools depend on each other in a loop, so no order can run them.',
      fix: 'Break the loop by removing one of the connections between these tools.',
      code: error.code,
    };
  },

  UNRESOLVED_TOOL_TYPE(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    return {
      title: 'Unrecognized Tool',
      explanation: `Tool '${toolId}' could not be matched to a known tool type. Its data is passed through unchanged.`,
      fix: `Fill in the generated stub for tool '${toolId}' by hand.`,
      code: error.code,
    };
  },

  MACRO_TOOL(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    const macro = extractQuoted(error.message)[1] || 'unknown';
    return {
      title: 'Macro Not Converted',
      explanation: `Tool '${toolId}' runs the macro '${macro}'. Macros are not converted; the tool becomes a pass-through stub.`,
      fix: `Rewrite the logic of '${macro}' in the generated stub.`,
      code: error.code,
    };
  },

  MISSING_SOURCE(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    return {
      title: 'Missing Input Data',
      explanation: `Tool '${toolId}' reads data but nothing is connected to it.`,
      fix: `Connect an upstream tool to '${toolId}', or remove it.`,
      code: error.code,
    };
  },

  INSUFFICIENT_JOIN_INPUTS(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    return {
      title: 'Join Needs Two Inputs',
      explanation: `Join '${toolId}' needs a left and a right input. No merge is generated for it.`,
      fix: `Connect two upstream tools to join '${toolId}'.`,
      code: error.code,
    };
  },

  UNUSED_NODE(error) {
    const toolId = error.node || extractQuoted(error.message)[0] || 'unknown';
    return {
      title: 'Unused Tool',
      explanation: `Tool '${toolId}' has no connections.`,
      fix: `Connect '${toolId}' to the rest of the workflow, or delete it.`,
      code: error.code,
    };
  },
};

/**
 * Get a friendly version of a diagnostic, or null when the code is unmapped
 */
export function getFriendlyError(error: {
  code: string;
  message: string;
  node?: string;
}): TFriendlyError | null {
  if (!Object.prototype.hasOwnProperty.call(errorMappers, error.code)) return null;
  return errorMappers[error.code](error);
}

/**
 * Format all validation errors/warnings with friendly messages.
 * Falls back to the original message for unmapped error codes.
 */
export function formatFriendlyDiagnostics(
  errors: Array<{ code: string; message: string; node?: string; type: 'error' | 'warning' }>
): string {
  if (errors.length === 0) return '';

  const lines: string[] = [];

  for (const error of errors) {
    const friendly = getFriendlyError(error);
    const severity = error.type === 'error' ? 'ERROR' : 'WARNING';

    if (friendly) {
      lines.push(`[${severity}] ${friendly.title}`);
      lines.push(`  ${friendly.explanation}`);
      lines.push(`  How to fix: ${friendly.fix}`);
      lines.push(`  Code: ${friendly.code}`);
    } else {
      lines.push(`[${severity}] ${error.code}`);
      lines.push(`  ${error.message}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}
