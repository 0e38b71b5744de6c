/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Utility module exports for pagepulse.
 */
export * from "./debugFilter.js";
export * from "./delay.js";
export * from "./errors.js";
export * from "./format.js";
export * from "./logger.js";
export * from "./version.js";
