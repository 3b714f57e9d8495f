export { OpenAICompatibleClient, DEFAULT_REQUEST_TIMEOUT_MS } from "./client.js";
export { formatMessagesForAPI, parseCompletion } from "./format.js";
