import fs from "node:fs";
import path from "node:path";
import type { BuildRecipe, RecipeDeclaration } from "../types/index.js";
import { RecipeParseError } from "./errors.js";

export const DECLARATION_FILE = "PKGBUILD";

const ASSIGNMENT = /([A-Za-z_][A-Za-z0-9_]*)=/y;
const BLANK = /\s/;
const WORD_END = /[\s;)]/;

class Cursor {
  pos = 0;
  line = 1;

  constructor(readonly src: string) {}

  peek(): string | undefined {
    return this.src[this.pos];
  }

  next(): string | undefined {
    const c = this.src[this.pos++];
    if (c === "\n") this.line++;
    return c;
  }

  eof(): boolean {
    return this.pos >= this.src.length;
  }

  skipLine(): void {
    while (!this.eof() && this.peek() !== "\n") this.next();
  }

  skipBlanks(includeNewlines: boolean): void {
    for (let c = this.peek(); c !== undefined; c = this.peek()) {
      if (BLANK.test(c) && (includeNewlines || c !== "\n")) {
        this.next();
      } else {
        break;
      }
    }
  }
}

function fail(file: string, line: number, detail: string): never {
  throw new RecipeParseError(file, line, detail);
}

/** Reads one shell word: adjacent quoted and unquoted segments joined. */
function readWord(cur: Cursor, file: string): string {
  let out = "";
  for (let c = cur.peek(); c !== undefined && !WORD_END.test(c); c = cur.peek()) {
    const start = cur.line;
    if (c === "'") {
      cur.next();
      while (cur.peek() !== "'") {
        if (cur.eof()) fail(file, start, "unterminated single quote");
        out += cur.next();
      }
      cur.next();
    } else if (c === '"') {
      cur.next();
      while (cur.peek() !== '"') {
        if (cur.eof()) fail(file, start, "unterminated double quote");
        const ch = cur.next();
        const following = cur.peek();
        if (ch === "\\" && following !== undefined && '"\\$`'.includes(following)) {
          out += cur.next();
        } else {
          out += ch;
        }
      }
      cur.next();
    } else if (c === "\\") {
      cur.next();
      const escaped = cur.next();
      if (escaped !== undefined && escaped !== "\n") out += escaped;
    } else {
      out += cur.next();
    }
  }
  return out;
}

function readArray(cur: Cursor, file: string): string[] {
  const start = cur.line;
  const values: string[] = [];
  for (;;) {
    cur.skipBlanks(true);
    const c = cur.peek();
    if (c === undefined) fail(file, start, "unterminated array (missing ')')");
    if (c === ")") {
      cur.next();
      return values;
    }
    if (c === "#") {
      cur.skipLine();
      continue;
    }
    const before = cur.pos;
    const word = readWord(cur, file);
    if (cur.pos === before) fail(file, cur.line, `unexpected '${c}' inside array`);
    values.push(word);
  }
}

/**
 * Skips a line that is not a top-level assignment, returning the change in
 * brace depth. Quotes are tracked so braces inside strings are ignored.
 */
function skipStatement(cur: Cursor): number {
  let depth = 0;
  let quote: string | null = null;
  for (let c = cur.peek(); c !== undefined; c = cur.peek()) {
    if (quote) {
      cur.next();
      if (c === "\\" && quote === '"') cur.next();
      else if (c === quote) quote = null;
      continue;
    }
    if (c === "\n") break;
    if (c === "#") {
      cur.skipLine();
      break;
    }
    cur.next();
    if (c === "'" || c === '"') quote = c;
    else if (c === "{") depth++;
    else if (c === "}") depth--;
    else if (c === "\\") cur.next();
  }
  return depth;
}

/** Drops any version constraint: `qt6-base>=6.5` becomes `qt6-base`. */
export function stripVersionConstraint(dep: string): string {
  return dep.split(/[<>=]/, 1)[0] ?? dep;
}

/**
 * Reads the fields of a PKGBUILD that the planner needs. Only top-level
 * assignments count; function bodies are skipped. Array entries that use
 * shell expansion cannot be resolved statically and are left out.
 */
export function parsePkgbuild(source: string, file: string = DECLARATION_FILE): RecipeDeclaration {
  const cur = new Cursor(source);
  const declaration: RecipeDeclaration = { depends: [], makedepends: [] };
  let depth = 0;

  while (!cur.eof()) {
    cur.skipBlanks(true);
    if (cur.eof()) break;

    if (cur.peek() === "#") {
      cur.skipLine();
      continue;
    }

    ASSIGNMENT.lastIndex = cur.pos;
    const match = depth === 0 ? ASSIGNMENT.exec(source) : null;
    if (!match) {
      depth = Math.max(0, depth + skipStatement(cur));
      continue;
    }

    const key = match[1] ?? "";
    cur.pos += match[0].length;

    let values: string[];
    if (cur.peek() === "(") {
      cur.next();
      values = readArray(cur, file);
    } else {
      values = [readWord(cur, file)];
    }
    // anything trailing on the line (`; other=...`) is not needed
    skipStatement(cur);

    const resolved = values.filter((v) => v !== "" && !v.includes("$"));
    switch (key) {
      case "pkgver":
        declaration.pkgver = resolved[0];
        break;
      case "depends":
        declaration.depends = resolved.map(stripVersionConstraint);
        break;
      case "makedepends":
        declaration.makedepends = resolved.map(stripVersionConstraint);
        break;
    }
  }

  return declaration;
}

export type ArtifactMatcher = (recipeName: string, fileName: string) => boolean;

/** First matching artifact, in name order, from the first directory that has one. */
export function findPrebuiltArtifact(
  recipeName: string,
  searchDirs: readonly string[],
  matches: ArtifactMatcher,
): string | undefined {
  for (const dir of searchDirs) {
    if (!fs.existsSync(dir)) continue;
    const hit = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && matches(recipeName, entry.name))
      .map((entry) => entry.name)
      .sort()[0];
    if (hit) return path.join(dir, hit);
  }
  return undefined;
}

export interface ReadRecipeOptions {
  artifactMatcher?: ArtifactMatcher;
  /** Extra directories searched for a prebuilt artifact after the recipe's own. */
  artifactDirs?: readonly string[];
}

/**
 * Loads a recipe directory. Returns null when the directory has no
 * declaration file; throws RecipeParseError when it has a malformed one.
 */
export function readRecipe(dir: string, options: ReadRecipeOptions = {}): BuildRecipe | null {
  const file = path.join(dir, DECLARATION_FILE);
  if (!fs.existsSync(file)) return null;

  const declaration = parsePkgbuild(fs.readFileSync(file, "utf-8"), file);
  const name = path.basename(dir);
  const recipe: BuildRecipe = {
    name,
    dir,
    depends: declaration.depends,
    makedepends: declaration.makedepends,
  };
  if (declaration.pkgver) recipe.version = declaration.pkgver;

  if (options.artifactMatcher) {
    const artifact = findPrebuiltArtifact(
      name,
      [dir, ...(options.artifactDirs ?? [])],
      options.artifactMatcher,
    );
    if (artifact) recipe.prebuiltArtifact = artifact;
  }
  return recipe;
}

export function listRecipeDirs(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  return fs
    .readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(root, entry.name))
    .sort();
}
