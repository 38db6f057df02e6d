import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { SpindleError } from "../../core/errors.js";

const SCRIPTS_DIR_SCENARIO_PREFIX = "scripts-dir:";
export const SCRIPT_FILE_EXTENSION = ".yarn";

export interface LoadedScenario {
  id: string;
  title: string;
  files: Record<string, string>;
}

const isScriptFile = (file: string): boolean => file.endsWith(SCRIPT_FILE_EXTENSION);

const toPosixPath = (filePath: string): string => filePath.split(path.sep).join("/");

const findProjectRoot = (): string => {
  let current = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new SpindleError("CLI_PROJECT_ROOT", "Cannot locate project root from CLI module path.");
    }
    current = parent;
  }
};

export const getExamplesScriptsRoot = (): string => path.join(findProjectRoot(), "examples", "scripts");

export const resolveScriptsDir = (scriptsDir: string): string => {
  const resolved = path.resolve(scriptsDir);
  if (!fs.existsSync(resolved)) {
    throw new SpindleError("CLI_SCRIPTS_DIR_NOT_FOUND", `Scripts directory does not exist: ${resolved}`);
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw new SpindleError("CLI_SCRIPTS_DIR_NOT_FOUND", `Scripts path is not a directory: ${resolved}`);
  }
  return resolved;
};

/** Reads every script file under `scriptsDir`, keyed by its posix path relative to it. */
export const readScriptFilesFromDir = (scriptsDir: string): Record<string, string> => {
  const collectFiles = (relativeDir = ""): string[] => {
    const fullDir = relativeDir ? path.join(scriptsDir, relativeDir) : scriptsDir;
    const entries = fs.readdirSync(fullDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    const collected: string[] = [];
    for (const entry of entries) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        collected.push(...collectFiles(relativePath));
        continue;
      }
      if (entry.isFile() && isScriptFile(entry.name)) {
        collected.push(toPosixPath(relativePath));
      }
    }
    return collected;
  };

  const files = collectFiles().sort();
  if (files.length === 0) {
    throw new SpindleError("CLI_SCRIPTS_DIR_EMPTY", `No ${SCRIPT_FILE_EXTENSION} files found in: ${scriptsDir}`);
  }
  const sources: Record<string, string> = {};
  for (const file of files) {
    sources[file] = fs.readFileSync(path.join(scriptsDir, ...file.split("/")), "utf8");
  }
  return sources;
};

export const makeScriptsDirScenarioId = (scriptsDir: string): string =>
  `${SCRIPTS_DIR_SCENARIO_PREFIX}${scriptsDir}`;

const parseScriptsDirScenarioId = (scenarioId: string): string => {
  const scriptsDir = scenarioId.startsWith(SCRIPTS_DIR_SCENARIO_PREFIX)
    ? scenarioId.slice(SCRIPTS_DIR_SCENARIO_PREFIX.length)
    : "";
  if (scriptsDir.length === 0) {
    throw new SpindleError(
      "CLI_STATE_INVALID",
      `State scenarioId must use ${SCRIPTS_DIR_SCENARIO_PREFIX}<absolute-path> format.`
    );
  }
  return scriptsDir;
};

export const loadSourceByScriptsDir = (scriptsDir: string): LoadedScenario => {
  const resolvedDir = resolveScriptsDir(scriptsDir);
  return {
    id: makeScriptsDirScenarioId(resolvedDir),
    title: `Scripts ${path.basename(resolvedDir)}`,
    files: readScriptFilesFromDir(resolvedDir),
  };
};

/** `id` names a directory under `examples/scripts`. */
export const loadExampleScenario = (id: string): LoadedScenario => {
  const dir = path.join(getExamplesScriptsRoot(), id);
  if (!fs.existsSync(dir)) {
    throw new SpindleError("CLI_SCENARIO_NOT_FOUND", `Unknown example: ${id}`);
  }
  return loadSourceByScriptsDir(dir);
};

export const loadSourceByRef = (scenarioRef: string): LoadedScenario =>
  loadSourceByScriptsDir(parseScriptsDirScenarioId(scenarioRef));
