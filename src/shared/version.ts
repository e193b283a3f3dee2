/** Tool name and version, as reported by `specforge version` and stamped on scaffolds. */
export const TOOL_NAME = "specforge";
export const VERSION = "0.1.0";
