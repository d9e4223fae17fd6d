export { ConsoleSink, type ConsoleSinkOptions } from "./console.js";
export { JsonSink } from "./json.js";
