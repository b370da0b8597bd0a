import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";

export const TEMPLATES_DIR = fileURLToPath(new URL("../../templates", import.meta.url));

// Output is shell and INI, never HTML
export function renderTemplate(
  content: string,
  variables: Record<string, string | number | boolean>,
): string {
  const template = Handlebars.compile(content, { noEscape: true, strict: true });
  return template(variables);
}

export function loadTemplate(name: string, templatesDir: string = TEMPLATES_DIR): string {
  const file = path.join(templatesDir, `${name}.hbs`);
  if (!fs.existsSync(file)) {
    throw new Error(`Template not found: ${file}`);
  }
  return fs.readFileSync(file, "utf-8");
}
