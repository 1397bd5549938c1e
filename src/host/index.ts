/**
 * Host binding exports.
 */

export { defineHost, defineAsyncHost } from "./host.js";
export type { HostFunction, HostResult, SyncHostFunction, AsyncHostFunction } from "./host.js";
