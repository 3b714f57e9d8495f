/**
 * Transport Exports
 */

export { ConsoleTransport, type ConsoleTransportOptions, type ConsoleOutput } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
