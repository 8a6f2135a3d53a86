/**
 * Shared entry point for lesson, chat, mistake and feedback schemas.
 *
 * @remarks
 * Consume these exports from `@language-tutor/shared/tutor` so the backend
 * validates exactly what the frontend renders.
 */
export * from "./schemas.js";
export * from "./error-types.js";
