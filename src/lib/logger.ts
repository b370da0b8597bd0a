const RESET = "\x1b[0m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";

function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

let capturing = false;
let captured: string[] = [];

function emit(prefix: string, color: string, msg: string, stream: "out" | "err" = "out"): void {
  if (capturing) {
    captured.push(stripAnsi(prefix ? `${prefix} ${msg}` : msg));
    return;
  }
  const line = prefix ? `${color}${prefix}${RESET} ${msg}` : `${color}${msg}${RESET}`;
  if (stream === "err") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  capture() {
    capturing = true;
    captured = [];
  },

  flush(): string[] {
    const messages = captured;
    captured = [];
    capturing = false;
    return messages;
  },

  isCapturing(): boolean {
    return capturing;
  },

  info(msg: string) {
    emit("info", CYAN, msg);
  },

  /** Section heading for a provisioning phase. */
  step(msg: string) {
    emit("==>", BLUE, msg);
  },

  success(msg: string) {
    emit("✓", GREEN, msg);
  },

  warn(msg: string) {
    emit("warn", YELLOW, msg);
  },

  error(msg: string) {
    emit("error", RED, msg, "err");
  },

  dim(msg: string) {
    emit("", DIM, msg);
  },

  bold(msg: string) {
    emit("", BOLD, msg);
  },

  table(headers: string[], rows: string[][]) {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
    );
    const format = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join("  ").trimEnd();

    emit("", DIM, `  ${format(headers.map((h) => h.toUpperCase()))}`);
    for (const row of rows) {
      emit("", "", `  ${format(row)}`);
    }
  },

  blank() {
    if (capturing) {
      captured.push("");
    } else {
      console.log();
    }
  },
};
