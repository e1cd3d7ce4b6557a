/**
 * Version of the tool whose global options this package defines
 */
export const TOOL_VERSION = '2.0.0';
