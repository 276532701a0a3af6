/**
 * LaTeX compiler
 * Each formula becomes a tightly cropped single-page PDF
 */

import { execFile } from "node:child_process";
import { mkdir, rm, writeFile } from "fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { promisify } from "node:util";
import type { Collaborators, MathConfig } from "../types";
import { CollaboratorError } from "../utils/errors";

const execFileAsync = promisify(execFile);

/**
 * Standalone document holding one formula, cropped to its bounding box
 */
export function buildLatexDocument(
  source: string,
  displayMode: boolean,
  config: Pick<MathConfig, "packages" | "macros">,
): string {
  const formula = displayMode ? `\\[${source}\\]` : `\\(${source}\\)`;
  return [
    "\\documentclass{article}",
    ...config.packages.map((name) => `\\usepackage{${name}}`),
    "\\usepackage[active,tightpage,pdftex]{preview}",
    ...config.macros,
    "\\begin{document}",
    "\\thispagestyle{empty}",
    "\\begin{preview}",
    formula,
    "\\end{preview}",
    "\\end{document}",
    "",
  ].join("\n");
}

export function createCompileMath(
  config: MathConfig,
  assetDir: string,
): Collaborators["compileMath"] {
  return async (source, displayMode, location) => {
    const base = path.resolve(assetDir, location);
    const directory = path.dirname(base);
    const texPath = `${base}.tex`;

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(texPath, buildLatexDocument(source, displayMode, config), "utf-8");
      await execFileAsync(config.compiler, [
        "-interaction=nonstopmode",
        "-halt-on-error",
        `-output-directory=${directory}`,
        texPath,
      ]);
    } catch (error) {
      throw new CollaboratorError(
        "compileMath",
        `${config.compiler} failed on "${source}", see ${base}.log`,
        { cause: error },
      );
    } finally {
      await rm(texPath, { force: true });
      await rm(`${base}.aux`, { force: true });
    }

    await rm(`${base}.log`, { force: true });
    return { href: pathToFileURL(`${base}.pdf`).href };
  };
}
