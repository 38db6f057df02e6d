import React, { useEffect, useRef, useState } from "react";
import { Box, Text, render, useApp, useInput } from "ink";

import { DEFAULT_START_NODE } from "../../runtime/dialogue.js";
import { replayScenario, startScenario, type BoundaryResult, type OptionItem } from "../core/dialogue-runner.js";
import { loadExampleScenario, loadSourceByScriptsDir, type LoadedScenario } from "../core/source-loader.js";
import { createPlayerState, loadPlayerState, savePlayerState } from "../core/state-store.js";

export const DEFAULT_STATE_FILE = "./.spindle/save.json";
const OPTION_VIEWPORT_ROWS = 5;
const TYPEWRITER_CHARS_PER_SECOND = 60;
const TYPEWRITER_TICK_MS = Math.floor(1000 / TYPEWRITER_CHARS_PER_SECOND);
const ELLIPSIS = "…";

export const truncateToWidth = (value: string, width: number): string => {
  if (width <= 0) {
    return "";
  }
  if (value.length <= width) {
    return value;
  }
  if (width === 1) {
    return ELLIPSIS;
  }
  return `${value.slice(0, width - 1)}${ELLIPSIS}`;
};

export const wrapLineToWidth = (value: string, width: number): string[] => {
  if (width <= 0 || value.length === 0) {
    return [""];
  }
  const rows: string[] = [];
  for (let i = 0; i < value.length; i += width) {
    rows.push(value.slice(i, i + width));
  }
  return rows;
};

/** Lines shown in the transcript; commands are bracketed so they read apart from dialogue. */
export const boundaryTranscript = (boundary: BoundaryResult): string[] =>
  boundary.output.map((item) => (item.kind === "text" ? item.text : `[${item.text}]`));

export interface TuiOptions {
  example: string | null;
  scriptsDir: string | null;
  startNode: string;
  stateFile: string;
}

export const parseTuiArgs = (argv: string[]): TuiOptions => {
  const options: TuiOptions = {
    example: null,
    scriptsDir: null,
    startNode: DEFAULT_START_NODE,
    stateFile: DEFAULT_STATE_FILE,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const value = argv[i + 1] ?? "";
    i += 1;
    if (token === "--example") {
      options.example = value;
    } else if (token === "--scripts-dir") {
      options.scriptsDir = value;
    } else if (token === "--node") {
      options.startNode = value;
    } else if (token === "--state-file") {
      options.stateFile = value;
    } else {
      throw new Error(`Unknown argument for tui mode: ${token}`);
    }
  }

  if (options.example && options.scriptsDir) {
    throw new Error("Use exactly one source selector: --example <id> or --scripts-dir <path>.");
  }
  if (!options.example && !options.scriptsDir) {
    throw new Error("Missing source selector. Use --example <id> or --scripts-dir <path>.");
  }
  if (!options.startNode) {
    throw new Error("--node cannot be empty.");
  }
  if (!options.stateFile) {
    throw new Error("--state-file cannot be empty.");
  }
  return options;
};

interface PlayerAppProps {
  scenario: LoadedScenario;
  startNode: string;
  stateFile: string;
}

const PlayerApp = ({ scenario, startNode, stateFile }: PlayerAppProps) => {
  const { exit } = useApp();
  const [terminalSize, setTerminalSize] = useState(() => ({
    columns: process.stdout.columns ?? 80,
    rows: process.stdout.rows ?? 24,
  }));

  const [firstRun] = useState(() => startScenario(scenario, startNode));
  const runRef = useRef(firstRun);
  const initial = firstRun.boundary;
  const [renderedLines, setRenderedLines] = useState<string[]>([]);
  const [pendingLines, setPendingLines] = useState<string[]>(() => boundaryTranscript(initial));
  const [typingLine, setTypingLine] = useState<string | null>(null);
  const [typingChars, setTypingChars] = useState(0);
  const [options, setOptions] = useState<OptionItem[]>(initial.options);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [scrollOffset, setScrollOffset] = useState(0);
  const [ended, setEnded] = useState(initial.event === "END");
  const [helpVisible, setHelpVisible] = useState(false);
  const [status, setStatus] = useState("ready");

  useEffect(() => {
    const updateTerminalSize = (): void => {
      setTerminalSize({
        columns: process.stdout.columns ?? 80,
        rows: process.stdout.rows ?? 24,
      });
    };
    process.stdout.on("resize", updateTerminalSize);
    return () => {
      process.stdout.off("resize", updateTerminalSize);
    };
  }, []);

  useEffect(() => {
    if (typingLine === null) {
      if (pendingLines.length === 0) {
        return;
      }
      const [nextLine, ...rest] = pendingLines;
      setPendingLines(rest);
      if (nextLine.length === 0) {
        setRenderedLines((prev) => [...prev, nextLine]);
        return;
      }
      setTypingLine(nextLine);
      setTypingChars(1);
      return;
    }

    if (typingChars >= typingLine.length) {
      setRenderedLines((prev) => [...prev, typingLine]);
      setTypingLine(null);
      setTypingChars(0);
      return;
    }

    const timer = globalThis.setTimeout(() => {
      setTypingChars((prev) => prev + 1);
    }, TYPEWRITER_TICK_MS);
    return () => {
      globalThis.clearTimeout(timer);
    };
  }, [pendingLines, typingLine, typingChars]);

  const showOptions = (boundary: BoundaryResult): void => {
    setOptions(boundary.options);
    setEnded(boundary.event === "END");
    setSelectedIndex(0);
    setScrollOffset(0);
  };

  const appendBoundary = (boundary: BoundaryResult): void => {
    const transcript = boundaryTranscript(boundary);
    if (transcript.length > 0) {
      setPendingLines((prev) => [...prev, ...transcript]);
    }
    showOptions(boundary);
  };

  const replaceBoundary = (boundary: BoundaryResult): void => {
    setRenderedLines([]);
    setPendingLines(boundaryTranscript(boundary));
    setTypingLine(null);
    setTypingChars(0);
    showOptions(boundary);
  };

  const restart = (): void => {
    runRef.current = startScenario(scenario, startNode);
    replaceBoundary(runRef.current.boundary);
    setStatus("restarted");
  };

  const moveCursor = (delta: -1 | 1): void => {
    if (options.length === 0) {
      setStatus("no pending options");
      return;
    }
    const nextIndex = Math.max(0, Math.min(options.length - 1, selectedIndex + delta));
    setSelectedIndex(nextIndex);
    setScrollOffset((prev) => {
      if (options.length <= OPTION_VIEWPORT_ROWS) {
        return 0;
      }
      if (nextIndex < prev) {
        return nextIndex;
      }
      if (nextIndex >= prev + OPTION_VIEWPORT_ROWS) {
        return nextIndex - OPTION_VIEWPORT_ROWS + 1;
      }
      return prev;
    });
  };

  const chooseCurrent = (): void => {
    const option = options[selectedIndex];
    if (!option) {
      setStatus("no pending options");
      return;
    }
    appendBoundary(runRef.current.choose(option.id));
    setStatus(`chose ${option.id}`);
  };

  useInput((input, key) => {
    try {
      if (key.escape || input === "q") {
        exit();
        return;
      }
      if (input === "h") {
        setHelpVisible((prev) => !prev);
        return;
      }
      if (input === "r") {
        restart();
        return;
      }
      const typingInProgress = typingLine !== null || pendingLines.length > 0;
      if (key.upArrow || key.downArrow || key.return) {
        if (typingInProgress) {
          setStatus("text streaming...");
          return;
        }
        if (key.return) {
          chooseCurrent();
        } else {
          moveCursor(key.upArrow ? -1 : 1);
        }
        return;
      }
      if (input === "s") {
        const { session } = runRef.current;
        savePlayerState(
          stateFile,
          createPlayerState(scenario.id, session.startNode, session.randomSeed, session.selections)
        );
        setStatus(`saved to ${stateFile}`);
        return;
      }
      if (input === "l") {
        const state = loadPlayerState(stateFile);
        if (state.scenarioId !== scenario.id) {
          throw new Error(`State scenario mismatch. expected=${scenario.id} actual=${state.scenarioId}`);
        }
        runRef.current = replayScenario(scenario, state.startNode, state.randomSeed, state.selections);
        replaceBoundary(runRef.current.boundary);
        setStatus(`loaded from ${stateFile}`);
      }
    } catch (error) {
      setStatus(error instanceof Error ? error.message : "unknown error");
    }
  });

  const lines = typingLine
    ? [...renderedLines, typingLine.slice(0, Math.max(0, Math.min(typingChars, typingLine.length)))]
    : renderedLines;
  const typingInProgress = typingLine !== null || pendingLines.length > 0;
  const contentWidth = Math.max(16, terminalSize.columns - 2);
  const optionTextWidth = Math.max(8, contentWidth - 2);
  // header (3) + divider + options title + viewport + window info + keys
  const reservedRows = 3 + 1 + 1 + OPTION_VIEWPORT_ROWS + 1 + (ended ? 1 : 0) + 1 + (helpVisible ? 1 : 0);
  const availableTextRows = Math.max(1, terminalSize.rows - reservedRows);
  const wrappedTextRows = lines.flatMap((line) => wrapLineToWidth(line, contentWidth));
  const visibleTextRows =
    wrappedTextRows.length <= availableTextRows ? wrappedTextRows : wrappedTextRows.slice(-availableTextRows);
  const optionRowsSource = !typingInProgress ? options : [];
  const visibleOptionRows = Array.from({ length: OPTION_VIEWPORT_ROWS }, (_value, rowIndex) => {
    const absoluteIndex = scrollOffset + rowIndex;
    const option = optionRowsSource[absoluteIndex];
    if (!option) {
      return { key: `option-empty-${rowIndex}`, text: " ", selected: false, available: true };
    }
    return {
      key: `option-${option.id}`,
      text: truncateToWidth(option.text, optionTextWidth),
      selected: absoluteIndex === selectedIndex,
      available: option.available,
    };
  });
  const windowStart = optionRowsSource.length === 0 ? 0 : scrollOffset + 1;
  const windowEnd =
    optionRowsSource.length === 0 ? 0 : Math.min(scrollOffset + OPTION_VIEWPORT_ROWS, optionRowsSource.length);
  const windowText =
    optionRowsSource.length > OPTION_VIEWPORT_ROWS
      ? truncateToWidth(`window ${windowStart}-${windowEnd} / ${optionRowsSource.length}`, contentWidth)
      : " ";
  const keyText = truncateToWidth(
    "keys: up/down move | enter choose | s save | l load | r restart | h help | q quit",
    contentWidth
  );
  const helpText = truncateToWidth(
    "saves record the options picked so far; loading replays them from the start node.",
    contentWidth
  );

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text>{truncateToWidth(`${scenario.title} | ${startNode}`, contentWidth)}</Text>
      <Text color="gray">{truncateToWidth(`state: ${stateFile}`, contentWidth)}</Text>
      <Text color="gray">{truncateToWidth(`status: ${status}`, contentWidth)}</Text>
      {visibleTextRows.map((line, index) => (
        <Text key={`line-${index}`}>{line}</Text>
      ))}
      <Text color="gray">{"─".repeat(contentWidth)}</Text>
      <Text color="cyan">{truncateToWidth("options (up/down + enter):", contentWidth)}</Text>
      <Box flexDirection="column">
        {visibleOptionRows.map((row) => (
          <Text key={row.key} color={row.selected ? "green" : row.available ? undefined : "gray"}>
            {row.selected ? `> ${row.text}` : `  ${row.text}`}
          </Text>
        ))}
        <Text color="gray">{windowText}</Text>
      </Box>
      {ended && <Text color="green">[end]</Text>}
      <Text color="yellow">{keyText}</Text>
      {helpVisible && <Text color="magenta">{helpText}</Text>}
    </Box>
  );
};

export const runTuiCommand = async (argv: string[]): Promise<number> => {
  try {
    const options = parseTuiArgs(argv);
    const scenario = options.scriptsDir
      ? loadSourceByScriptsDir(options.scriptsDir)
      : loadExampleScenario(options.example ?? "");
    const app = render(<PlayerApp scenario={scenario} startNode={options.startNode} stateFile={options.stateFile} />);
    await app.waitUntilExit();
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown TUI error.";
    process.stderr.write(`${message}\n`);
    return 1;
  }
};
