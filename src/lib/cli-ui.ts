/**
 * Terminal presentation for gitscribe
 *
 * Everything printed outside the prompts goes through here so that
 * NO_COLOR, --no-color, CI and piped output degrade the same way.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import boxen from "boxen";
// cli-table3 uses CommonJS `export =` syntax, default import works with esModuleInterop
import Table from "cli-table3";
import gradient from "gradient-string";
import { isCI, isStdoutTTY } from "./tty.js";

export interface UIConfig {
  noColor: boolean;
  /** Debug lines are interleaved, so spinners print plain lines instead */
  verbose: boolean;
  isTTY: boolean;
  isCI: boolean;
  /** Skip the logo and box borders */
  minimal: boolean;
}

let settings: UIConfig = {
  noColor: false,
  verbose: false,
  isTTY: isStdoutTTY(),
  isCI: isCI(),
  minimal: false,
};

/**
 * Merge display settings. NO_COLOR and GITSCRIBE_MINIMAL=1 always win, and
 * CI implies minimal unless the caller says otherwise.
 */
export function configureUI(options: Partial<UIConfig>): void {
  settings = { ...settings, ...options };
  if (process.env.NO_COLOR) settings.noColor = true;
  if (process.env.GITSCRIBE_MINIMAL === "1") settings.minimal = true;
  if (settings.isCI && options.minimal === undefined) settings.minimal = true;
}

type Paint = (s: string) => string;

// Resolved on every call so configureUI() after import still applies
const paint =
  (style: Paint): Paint =>
  (s) =>
    settings.noColor ? s : style(s);

export const colors = {
  success: paint(chalk.green),
  error: paint(chalk.red),
  warning: paint(chalk.yellow),
  info: paint(chalk.blue),
  muted: paint(chalk.gray),
  header: paint(chalk.blue.bold),
  label: paint(chalk.cyan),
  accent: paint(chalk.cyan),
  bold: paint(chalk.bold),
};

/** Old conhost draws neither rounded corners nor heavy box glyphs */
function asciiFrames(): boolean {
  return (
    process.platform === "win32" &&
    !process.env.WT_SESSION &&
    !process.env.TERM_PROGRAM
  );
}

const WORDMARK = `
       _ _                 _ _
  __ _(_) |_ ___  ___ _ __(_) |__   ___
 / _\` | | __/ __|/ __| '__| | '_ \\ / _ \\
| (_| | | |_\\__ \\ (__| |  | | |_) |  __/
 \\__, |_|\\__|___/\\___|_|  |_|_.__/ \\___|
 |___/
`.slice(1);

export function logo(): string {
  if (settings.minimal) return "";
  if (settings.noColor || !settings.isTTY) return WORDMARK;
  return gradient(["#F97316", "#EC4899", "#8B5CF6"])(WORDMARK);
}

export function banner(): string {
  if (settings.minimal) return "";
  return `${logo()}\n${colors.muted("  Commit messages and pull requests, drafted for you")}\n`;
}

export type StatusType = "success" | "error" | "warning" | "info";

const STATUS_MARKS: Record<StatusType, { plain: string; glyph: string; tone: Paint }> = {
  success: { plain: "[OK]", glyph: "✓", tone: chalk.green },
  error: { plain: "[FAIL]", glyph: "✗", tone: chalk.red },
  warning: { plain: "[WARN]", glyph: "⚠", tone: chalk.yellow },
  info: { plain: "[i]", glyph: "ℹ", tone: chalk.blue },
};

export function statusIcon(type: StatusType): string {
  const mark = STATUS_MARKS[type];
  return settings.noColor ? mark.plain : mark.tone(mark.glyph);
}

export function printStatus(type: StatusType, message: string): void {
  console.log(`${statusIcon(type)} ${message}`);
}

export interface SpinnerManager {
  start(text?: string): SpinnerManager;
  succeed(text?: string): SpinnerManager;
  fail(text?: string): SpinnerManager;
  warn(text?: string): SpinnerManager;
  stop(): SpinnerManager;
  text: string;
  isSpinning: boolean;
}

type SpinnerOutcome = Exclude<StatusType, "info">;

/**
 * Progress line for one running step. Animates with ora on an interactive
 * color terminal; elsewhere prints one line when started and one when done.
 */
class ProgressLine implements SpinnerManager {
  private label: string;
  private running = false;
  private readonly live: Ora | null;

  constructor(label: string, animate: boolean) {
    this.label = label;
    this.live = animate ? ora({ text: label, color: "cyan", spinner: "dots" }) : null;
  }

  get text(): string {
    return this.label;
  }

  set text(value: string) {
    this.label = value;
    if (this.live) this.live.text = value;
  }

  get isSpinning(): boolean {
    return this.live ? this.live.isSpinning : this.running;
  }

  start(text?: string): SpinnerManager {
    if (text) this.text = text;
    if (this.live) {
      this.live.start();
    } else {
      this.running = true;
      console.log(colors.accent(`⏳ ${this.label}`));
    }
    return this;
  }

  succeed(text?: string): SpinnerManager {
    return this.finish("success", text);
  }

  fail(text?: string): SpinnerManager {
    return this.finish("error", text);
  }

  warn(text?: string): SpinnerManager {
    return this.finish("warning", text);
  }

  stop(): SpinnerManager {
    this.live?.stop();
    this.running = false;
    return this;
  }

  private finish(outcome: SpinnerOutcome, text?: string): SpinnerManager {
    if (text) this.text = text;
    const mark = STATUS_MARKS[outcome];
    if (this.live) {
      this.live.stopAndPersist({ symbol: mark.tone(mark.glyph), text: this.label });
    } else {
      this.running = false;
      console.log(paint(mark.tone)(`${mark.glyph} ${this.label}`));
    }
    return this;
  }
}

export function spinner(text: string): SpinnerManager {
  const animate =
    settings.isTTY && !settings.verbose && !settings.isCI && !settings.noColor;
  return new ProgressLine(text, animate);
}

export type BoxStyle = "success" | "error" | "warning" | "info" | "default";

const BORDERS: Record<BoxStyle, string | undefined> = {
  success: "green",
  error: "red",
  warning: "yellow",
  info: "blue",
  default: undefined,
};

/**
 * Framed content on a decorated terminal, the bare content otherwise
 */
export function box(content: string, style: BoxStyle = "default"): string {
  if (settings.minimal || !settings.isTTY) return content;
  return boxen(content, {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: asciiFrames() ? "classic" : "round",
    borderColor: settings.noColor ? undefined : BORDERS[style],
  });
}

function titled(style: Exclude<BoxStyle, "default">, heading: string, body: string): string {
  return box(`${colors[style](colors.bold(heading))}\n\n${body}`, style);
}

export const errorBox = (title: string, body: string): string =>
  titled("error", `❌ ${title}`, body);

export const warningBox = (title: string, body: string): string =>
  titled("warning", `⚠️  ${title}`, body);

export const infoBox = (title: string, body: string): string =>
  titled("info", title, body);

// cli-table3 border slots drawn with plain ASCII
const ASCII_TABLE = {
  top: "-", bottom: "-", mid: "-",
  left: "|", right: "|", middle: "|",
  "top-left": "+", "top-mid": "+", "top-right": "+",
  "left-mid": "+", "mid-mid": "+", "right-mid": "+",
  "bottom-left": "+", "bottom-mid": "+", "bottom-right": "+",
};

export function keyValueTable(rows: Record<string, string | number>): string {
  const table = new Table({
    style: { head: [], border: settings.noColor ? [] : ["gray"] },
    chars: asciiFrames() ? ASCII_TABLE : undefined,
  });
  for (const [key, value] of Object.entries(rows)) {
    table.push([colors.label(key), String(value)]);
  }
  return table.toString();
}

export const ui = {
  spinner,
  errorBox,
  warningBox,
  infoBox,
  keyValueTable,
  printStatus,
};
