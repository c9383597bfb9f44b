export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
export { FileTransport, formatPlainText, type FileTransportOptions } from "./file.js";
