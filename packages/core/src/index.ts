/**
 * @packsmith/core
 *
 * Cross-cutting helpers shared by the editor tooling packages.
 */

export { createConsoleLogger, type Logger, silentLogger } from "./logger.js";
export { sleep, withTimeout } from "./timeout.js";

export const PACKAGE_NAME = "@packsmith/core" as const;
