/**
 * Core module exports
 */

export * from "./backup";
