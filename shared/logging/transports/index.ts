export { ConsoleTransport, formatConsoleEntry, type ConsoleTransportOptions, type ConsoleFormat } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
