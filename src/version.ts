export const NAME = "Tangent Calculator MCP";
export const VERSION = "1.0.0";
