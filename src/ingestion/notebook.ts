/**
 * Jupyter notebook to script conversion.
 *
 * @module ingestion/notebook
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { NotebookConversionError } from "./errors.js";

/**
 * First line of every converted notebook
 */
export const NOTEBOOK_HEADER = "# Jupyter notebook converted to Python script.";

const MultilineText = z.union([z.string(), z.array(z.string())]);

const OutputSchema = z
  .object({
    output_type: z.string(),
    text: MultilineText.optional(),
    data: z.record(z.unknown()).optional(),
    ename: z.string().optional(),
    evalue: z.string().optional(),
  })
  .passthrough();

const CellSchema = z
  .object({
    cell_type: z.string(),
    source: MultilineText,
    outputs: z.array(OutputSchema).optional(),
  })
  .passthrough();

/**
 * Notebook document, nbformat 4 (top-level cells) or 3 (cells in worksheets)
 */
export const NotebookSchema = z
  .object({
    cells: z.array(CellSchema).optional(),
    worksheets: z.array(z.object({ cells: z.array(CellSchema) }).passthrough()).optional(),
  })
  .passthrough();

type NotebookCell = z.infer<typeof CellSchema>;
type NotebookOutput = z.infer<typeof OutputSchema>;

function joinText(text: string | string[]): string {
  return typeof text === "string" ? text : text.join("");
}

function outputText(output: NotebookOutput, path: string): string {
  switch (output.output_type) {
    case "stream":
      return joinText(output.text ?? "");
    case "execute_result":
    case "display_data": {
      const plain = MultilineText.safeParse(output.data?.["text/plain"]);
      return plain.success ? joinText(plain.data) : "";
    }
    case "error":
      return `Error: ${output.ename ?? ""}: ${output.evalue ?? ""}`;
    default:
      throw new NotebookConversionError(`Unknown output type: ${output.output_type}`, path);
  }
}

function convertCell(cell: NotebookCell, path: string): string | null {
  if (cell.cell_type !== "markdown" && cell.cell_type !== "code" && cell.cell_type !== "raw") {
    throw new NotebookConversionError(`Unknown cell type: ${cell.cell_type}`, path);
  }

  const source = joinText(cell.source);
  if (source === "") {
    return null;
  }

  if (cell.cell_type !== "code") {
    return `"""\n${source}\n"""`;
  }

  const outputs = cell.outputs ?? [];
  if (outputs.length === 0) {
    return source;
  }

  const lines = outputs
    .map((output) => outputText(output, path))
    .join("\n")
    .split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  return `${source}\n# Output:\n${lines.map((line) => `#   ${line}`).join("\n")}`;
}

/**
 * Convert parsed notebook JSON to script text.
 *
 * @param document - Parsed notebook JSON
 * @param path - Notebook path, for error reporting
 * @throws {NotebookConversionError} If the document is not a notebook or has unknown cells
 */
export function convertNotebook(document: unknown, path: string): string {
  const parsed = NotebookSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new NotebookConversionError(
      `Invalid notebook format${where}: ${issue?.message ?? "unknown error"}`,
      path,
      parsed.error
    );
  }

  const { cells, worksheets } = parsed.data;
  const selected = worksheets && worksheets.length > 0 ? worksheets[0]?.cells : cells;
  if (selected === undefined) {
    throw new NotebookConversionError("Notebook has no cells", path);
  }

  const blocks = [NOTEBOOK_HEADER];
  for (const cell of selected) {
    const block = convertCell(cell, path);
    if (block !== null) {
      blocks.push(block);
    }
  }

  return `${blocks.join("\n\n")}\n`;
}

/**
 * Read a notebook file and convert it to script text.
 *
 * @throws {NotebookConversionError} If the file cannot be read, parsed or converted
 */
export async function processNotebook(path: string): Promise<string> {
  let raw: string;
  let document: unknown;

  try {
    raw = await readFile(path, "utf-8");
    document = JSON.parse(raw);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new NotebookConversionError(
      cause?.message ?? String(error),
      path,
      cause
    );
  }

  return convertNotebook(document, path);
}
