/**
 * Ollama Provider
 */

export { OllamaClient } from "./client.js";
export type { OllamaClientOptions } from "./client.js";
export { formatMessagesForAPI, parseChatReply, parseModelList, parseVersion } from "./format.js";
