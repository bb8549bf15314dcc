import type { Result } from "@scanwarden/core";
import type { NotFoundError } from "../errors.js";

/**
 * Maps template identifiers to files the scanner can load.
 */
export interface TemplateStore {
  resolve(templateId: string): Promise<Result<string, NotFoundError>>;
}
