/**
 * Session notes: a small persistent memory the model can write to and read back
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { defineTool, fail, isRecord, ok, sanitizeError, type Tool } from "@stepwise/core";

export type Note = {
  timestamp: string;
  category: string;
  content: string;
};

export type NoteToolsOptions = {
  /** JSON file holding the notes; created on first write */
  file: string;
  /** Clock used for note timestamps */
  now?: () => Date;
};

type RecordParams = { content: string; category?: string };
type RecallParams = { category?: string };

const DEFAULT_CATEGORY = "general";

function isNote(value: unknown): value is Note {
  return (
    isRecord(value) &&
    typeof value.timestamp === "string" &&
    typeof value.category === "string" &&
    typeof value.content === "string"
  );
}

async function readNotes(file: string): Promise<Note[]> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
  if (text.trim() === "") {
    return [];
  }
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error(`Notes file ${file} does not hold a JSON array`);
  }
  const invalid = parsed.findIndex((entry) => !isNote(entry));
  if (invalid !== -1) {
    throw new Error(`Notes file ${file} has a malformed entry at index ${invalid}`);
  }
  return parsed.filter(isNote);
}

function formatNotes(notes: Note[]): string {
  return notes
    .map((note, i) => `${i + 1}. [${note.category}] ${note.content}\n   (recorded at ${note.timestamp})`)
    .join("\n");
}

/**
 * `record_note` and `recall_notes` sharing one notes file
 */
export function createNoteTools(options: NoteToolsOptions): [Tool, Tool] {
  const { file } = options;
  const now = options.now ?? (() => new Date());
  // Writes are read-modify-write; keep them in order
  let writes: Promise<void> = Promise.resolve();

  const append = (note: Note): Promise<void> => {
    const run = writes.then(async () => {
      const notes = await readNotes(file);
      notes.push(note);
      await mkdir(dirname(file), { recursive: true });
      await writeFile(file, `${JSON.stringify(notes, null, 2)}\n`, "utf8");
    });
    writes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  const recordNote = defineTool<RecordParams>({
    name: "record_note",
    description:
      "Record an important fact, decision or user preference so it can be recalled later in this or a future session.",
    parameters: {
      type: "object",
      properties: {
        content: { type: "string", minLength: 1, description: "The information to remember" },
        category: {
          type: "string",
          description: `Optional label such as user_preference or project_info (default: ${DEFAULT_CATEGORY})`,
        },
      },
      required: ["content"],
    },
    execute: async ({ content, category }) => {
      const note: Note = {
        timestamp: now().toISOString(),
        category: category || DEFAULT_CATEGORY,
        content,
      };
      try {
        await append(note);
      } catch (error) {
        return fail(`Failed to record note: ${sanitizeError(error)}`);
      }
      return ok(`Recorded note: ${note.content} (category: ${note.category})`);
    },
  });

  const recallNotes = defineTool<RecallParams>({
    name: "recall_notes",
    description: "Recall previously recorded notes, optionally only those in one category.",
    parameters: {
      type: "object",
      properties: {
        category: { type: "string", description: "Only return notes in this category" },
      },
    },
    execute: async ({ category }) => {
      let notes: Note[];
      try {
        notes = await readNotes(file);
      } catch (error) {
        return fail(`Failed to read notes: ${sanitizeError(error)}`);
      }
      if (notes.length === 0) {
        return ok("No notes recorded yet.");
      }
      if (category) {
        const matching = notes.filter((note) => note.category === category);
        return ok(matching.length ? formatNotes(matching) : `No notes found in category: ${category}`);
      }
      return ok(formatNotes(notes));
    },
  });

  return [recordNote, recallNotes];
}
