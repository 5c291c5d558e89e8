export { printError, printResults, printUsage } from "./printer.js";
