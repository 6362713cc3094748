/**
 * read_file, write_file and edit_file, resolved against a workspace directory
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { defineTool, fail, ok, sanitizeError, type Tool } from "@stepwise/core";

export type FileToolsOptions = {
  /** Relative paths resolve here (default: the current directory) */
  workspaceDir?: string;
};

type ReadParams = { path: string; offset?: number; limit?: number };
type WriteParams = { path: string; content: string };
type EditParams = { path: string; old_str: string; new_str: string; replace_all?: boolean };

const DEFAULT_READ_LIMIT = 2000;

/**
 * Number lines as `<n>|<text>`, right-aligning the numbers
 */
export function numberLines(text: string, offset = 1, limit = DEFAULT_READ_LIMIT): string {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  const selected = lines.slice(offset - 1, offset - 1 + limit);
  const width = String(offset + selected.length - 1).length;
  return selected.map((line, i) => `${String(offset + i).padStart(width, " ")}|${line}`).join("\n");
}

function countOccurrences(text: string, search: string): number {
  let count = 0;
  for (let at = text.indexOf(search); at !== -1; at = text.indexOf(search, at + search.length)) {
    count++;
  }
  return count;
}

export function createFileTools(options: FileToolsOptions = {}): [Tool, Tool, Tool] {
  const root = options.workspaceDir ?? process.cwd();
  const resolvePath = (path: string) => (isAbsolute(path) ? path : resolve(root, path));

  const readFileTool = defineTool<ReadParams>({
    name: "read_file",
    description:
      "Read a text file. Lines come back numbered as `<n>|<text>`; use offset and limit for large files.",
    parameters: {
      type: "object",
      properties: {
        path: { type: "string", minLength: 1, description: "File path, absolute or relative to the workspace" },
        offset: { type: "integer", minimum: 1, description: "First line to return (1-based)" },
        limit: { type: "integer", minimum: 1, description: `Number of lines to return (default: ${DEFAULT_READ_LIMIT})` },
      },
      required: ["path"],
    },
    execute: async ({ path, offset, limit }) => {
      let text: string;
      try {
        text = await readFile(resolvePath(path), "utf8");
      } catch (error) {
        return fail(`Could not read ${path}: ${sanitizeError(error)}`);
      }
      return ok(numberLines(text, offset, limit));
    },
  });

  const writeFileTool = defineTool<WriteParams>({
    name: "write_file",
    description: "Create or overwrite a file with the given content. Parent directories are created.",
    parameters: {
      type: "object",
      properties: {
        path: { type: "string", minLength: 1, description: "File path, absolute or relative to the workspace" },
        content: { type: "string", description: "Complete file content" },
      },
      required: ["path", "content"],
    },
    execute: async ({ path, content }) => {
      const target = resolvePath(path);
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, "utf8");
      } catch (error) {
        return fail(`Could not write ${path}: ${sanitizeError(error)}`);
      }
      return ok(`Wrote ${content.length} characters to ${path}`);
    },
  });

  const editFileTool = defineTool<EditParams>({
    name: "edit_file",
    description:
      "Replace exact text in a file. old_str must match exactly once unless replace_all is set.",
    parameters: {
      type: "object",
      properties: {
        path: { type: "string", minLength: 1, description: "File path, absolute or relative to the workspace" },
        old_str: { type: "string", minLength: 1, description: "Exact text to replace" },
        new_str: { type: "string", description: "Replacement text" },
        replace_all: { type: "boolean", description: "Replace every occurrence (default: false)" },
      },
      required: ["path", "old_str", "new_str"],
    },
    execute: async ({ path, old_str: oldStr, new_str: newStr, replace_all: replaceAll }) => {
      const target = resolvePath(path);
      let text: string;
      try {
        text = await readFile(target, "utf8");
      } catch (error) {
        return fail(`Could not read ${path}: ${sanitizeError(error)}`);
      }

      const count = countOccurrences(text, oldStr);
      if (count === 0) {
        return fail(`old_str not found in ${path}`);
      }
      if (count > 1 && !replaceAll) {
        return fail(`old_str occurs ${count} times in ${path}; add surrounding text or set replace_all`);
      }

      const updated = replaceAll ? text.split(oldStr).join(newStr) : text.replace(oldStr, () => newStr);
      try {
        await writeFile(target, updated, "utf8");
      } catch (error) {
        return fail(`Could not write ${path}: ${sanitizeError(error)}`);
      }
      return ok(`Replaced ${count} occurrence${count === 1 ? "" : "s"} in ${path}`);
    },
  });

  return [readFileTool, writeFileTool, editFileTool];
}
