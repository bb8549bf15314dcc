import { readFile, stat } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { glob } from "glob";
import { Ok, Err, type Result } from "@scanwarden/core";
import { NotFoundError } from "../core/errors.js";
import type { TemplateStore } from "../core/ports/index.js";

const TEMPLATE_EXTENSIONS = [".yaml", ".yml"];

/** Top-level `id:` of a template file. */
const ID_LINE = /^id:\s*["']?([^"'\s#]+)["']?\s*(?:#.*)?$/m;

/**
 * Resolves template identifiers against a directory of YAML templates.
 *
 * Lookup order:
 * 1. A path to an existing template file (absolute, or relative to the directory)
 * 2. `<dir>/<id>.yaml`, then `<dir>/<id>.yml`
 * 3. The first template under the directory whose `id:` matches
 */
export class FileTemplateStore implements TemplateStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async resolve(templateId: string): Promise<Result<string, NotFoundError>> {
    const id = templateId.trim();

    if (hasTemplateExtension(id)) {
      const path = isAbsolute(id) ? id : join(this.dir, id);
      if (await isFile(path)) {
        return Ok(path);
      }
    }

    for (const ext of TEMPLATE_EXTENSIONS) {
      const path = join(this.dir, `${id}${ext}`);
      if (await isFile(path)) {
        return Ok(path);
      }
    }

    const found = await this.findById(id);
    return found ? Ok(found) : Err(new NotFoundError(`Template not found: ${id}`));
  }

  private async findById(id: string): Promise<string | null> {
    const files = await glob("**/*.{yaml,yml}", {
      cwd: this.dir,
      absolute: true,
      nodir: true,
    });

    for (const file of files.sort()) {
      const content = await readTemplate(file);
      if (content !== null && ID_LINE.exec(content)?.[1] === id) {
        return file;
      }
    }
    return null;
  }
}

/** Template text, or null for a file that cannot be read (dangling link, no permission). */
async function readTemplate(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch {
    return null;
  }
}

function hasTemplateExtension(id: string): boolean {
  return TEMPLATE_EXTENSIONS.some((ext) => id.endsWith(ext));
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
