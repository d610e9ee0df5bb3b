/**
 * Task Handler Barrel Export
 */

export { createSourceTask, handleCall, handleEdetail, handleEvents, handleReach } from "./run_source.js";
export { handleConsolidate, collectSourceRecords } from "./consolidate.js";
