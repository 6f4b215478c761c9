/**
 * CLI UI module exports
 */

export { color, fatal, printUsage, usage } from "./output";
