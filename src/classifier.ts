import type { TConfigMap, TToolType } from './ast/types.js';
import {
  ENGINE_CONFIG_MARKERS,
  FILE_REFERENCE_KEY,
  GUI_PLUGIN_MARKERS,
  MACRO_TOOL_PREFIX,
  OUTPUT_FILE_KEY,
  OUTPUT_KEY_MARKER,
  PLUGIN_FAMILIES,
} from './constants.js';

export type TClassifierInput = {
  pluginRef: string;
  macroRef?: string;
  config: TConfigMap;
};

/**
 * Resolve a node's tool type from its plugin signature and configuration.
 *
 * Rules, first match wins:
 * 1. A top-level `File` key makes it a file tool: `output_data` when the config
 *    also holds `FileName_Out` or any key containing "output", else `input_data`.
 * 2. Engine-family plugins: substring search of the lowercased serialized config,
 *    in the order of {@link ENGINE_CONFIG_MARKERS}.
 * 3. Gui-family plugins: substring search of the lowercased plugin name.
 * 4. A macro reference yields `macro:<name>`.
 * 5. Anything else is `unknown`.
 *
 * This is a heuristic. A config mentioning several markers resolves to the
 * earliest one in the table, even when a later one was meant.
 */
export function classifyToolType(input: TClassifierInput): TToolType {
  const { pluginRef, macroRef, config } = input;

  if (Object.prototype.hasOwnProperty.call(config, FILE_REFERENCE_KEY)) {
    return hasOutputMarker(config) ? 'output_data' : 'input_data';
  }

  if (pluginRef.includes(PLUGIN_FAMILIES.ENGINE)) {
    const serialized = JSON.stringify(config).toLowerCase();
    const hit = ENGINE_CONFIG_MARKERS.find((entry) =>
      entry.markers.some((marker) => serialized.includes(marker))
    );
    if (hit) return hit.toolType;
  } else if (pluginRef.includes(PLUGIN_FAMILIES.GUI)) {
    const plugin = pluginRef.toLowerCase();
    const hit = GUI_PLUGIN_MARKERS.find((entry) => plugin.includes(entry.marker));
    if (hit) return hit.toolType;
  }

  if (macroRef) {
    return `${MACRO_TOOL_PREFIX}${macroRef}`;
  }

  return 'unknown';
}

function hasOutputMarker(config: TConfigMap): boolean {
  return Object.keys(config).some(
    (key) => key === OUTPUT_FILE_KEY || key.toLowerCase().includes(OUTPUT_KEY_MARKER)
  );
}

export function isMacroToolType(toolType: TToolType): toolType is `macro:${string}` {
  return toolType.startsWith(MACRO_TOOL_PREFIX);
}
