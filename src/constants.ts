/**
 * # Document & Classifier Constants
 *
 * Element and attribute names of the workflow document, plus the marker
 * tables the classifier walks. The document shape these names describe:
 *
 * ```
 * <AlteryxDocument yxmdVer="2023.1">
 *   <Nodes>
 *     <Node ToolID="1">
 *       <GuiSettings><Position x="54" y="54" /></GuiSettings>
 *       <EngineSettings EngineDll="AlteryxBasePluginsEngine.dll" Macro="..." />
 *       <Properties>
 *         <Configuration> ...nested config... </Configuration>
 *         <Annotation><Name>Label</Name></Annotation>
 *       </Properties>
 *     </Node>
 *   </Nodes>
 *   <Connections>
 *     <Connection name="Output">
 *       <Origin ToolID="1" /> <Destination ToolID="2" />
 *     </Connection>
 *   </Connections>
 *   <Properties><MetaInfo><Author>...</Author></MetaInfo></Properties>
 * </AlteryxDocument>
 * ```
 */

export const DOCUMENT_TAGS = {
  NODE: 'Node',
  ENGINE_SETTINGS: 'EngineSettings',
  GUI_SETTINGS: 'GuiSettings',
  POSITION: 'Position',
  PROPERTIES: 'Properties',
  CONFIGURATION: 'Configuration',
  ANNOTATION: 'Annotation',
  ANNOTATION_NAME: 'Name',
  CONNECTION: 'Connection',
  ORIGIN: 'Origin',
  DESTINATION: 'Destination',
  META_INFO: 'MetaInfo',
} as const;

export const DOCUMENT_ATTRIBUTES = {
  TOOL_ID: 'ToolID',
  ENGINE_DLL: 'EngineDll',
  MACRO: 'Macro',
  VERSION: 'version',
  YXMD_VERSION: 'yxmdVer',
  CONNECTION_NAME: 'name',
  ORIGIN_PORT: 'Connection',
} as const;

/** MetaInfo children copied into workflow metadata */
export const META_INFO_FIELDS = {
  Author: 'author',
  Description: 'description',
  CreationDate: 'creationDate',
} as const;

export const DEFAULT_PORT_NAME = 'Output';
export const UNKNOWN_VERSION = 'Unknown';

// =============================================================================
// Classifier markers
// =============================================================================

export const PLUGIN_FAMILIES = {
  ENGINE: 'AlteryxBasePluginsEngine',
  GUI: 'AlteryxBasePluginsGui',
} as const;

/** Config key naming a file; its presence makes a node an input or output tool */
export const FILE_REFERENCE_KEY = 'File';
export const OUTPUT_FILE_KEY = 'FileName_Out';
export const OUTPUT_KEY_MARKER = 'output';

/**
 * Substring markers searched in the lowercased serialized config of
 * engine-family tools. Order is significant: the first hit wins.
 */
export const ENGINE_CONFIG_MARKERS: ReadonlyArray<{
  markers: readonly string[];
  toolType:
    | 'filter'
    | 'join'
    | 'sort'
    | 'summarize'
    | 'formula'
    | 'select'
    | 'unique'
    | 'sample'
    | 'record_id';
}> = [
  { markers: ['filter'], toolType: 'filter' },
  { markers: ['join'], toolType: 'join' },
  { markers: ['sort'], toolType: 'sort' },
  { markers: ['summarize', 'groupby'], toolType: 'summarize' },
  { markers: ['formula'], toolType: 'formula' },
  { markers: ['select'], toolType: 'select' },
  { markers: ['unique'], toolType: 'unique' },
  { markers: ['sample'], toolType: 'sample' },
  { markers: ['recordid'], toolType: 'record_id' },
];

/** Plugin-name markers for gui-family tools, lowercased, checked in order */
export const GUI_PLUGIN_MARKERS: ReadonlyArray<{ marker: string; toolType: 'browse' | 'text_input' }> = [
  { marker: 'browse', toolType: 'browse' },
  { marker: 'textinput', toolType: 'text_input' },
];

export const MACRO_TOOL_PREFIX = 'macro:';

// =============================================================================
// Emitted script
// =============================================================================

export const PYTHON_IMPORTS = {
  PANDAS: 'pandas as pd',
  NUMPY: 'numpy as np',
  OPENPYXL: 'openpyxl',
} as const;

export type TPythonImport = (typeof PYTHON_IMPORTS)[keyof typeof PYTHON_IMPORTS];
