// src/cli/menu.ts

import path from "path";
import type { Template } from "../schema";
import { formatCopyStats } from "../core/copy-tree";
import {
  instantiateTemplate,
  listTemplates,
  removeTemplate,
  showTemplate,
  type ActionContext,
} from "../core/template-actions";
import type { Prompter } from "./prompt";

export type MenuAction = "new" | "tree" | "delete" | "quit";

export interface MenuOptions {
  prompter: Prompter;
  write: (text: string) => void;

  /**
   * Default parent directory for new copies.
   */
  cwd: string;
}

/**
 * Map a menu answer to an action. End of input means quit.
 */
export function parseMenuAction(answer: string | undefined): MenuAction | undefined {
  if (answer === undefined) return "quit";
  switch (answer.trim().toLowerCase()) {
    case "n":
    case "new":
      return "new";
    case "t":
    case "tree":
      return "tree";
    case "d":
    case "delete":
      return "delete";
    case "q":
    case "quit":
    case "exit":
      return "quit";
    default:
      return undefined;
  }
}

/**
 * Pick a template by its 1-based list number or by exact name.
 */
export function resolveTemplateChoice(
  answer: string,
  templates: readonly Template[],
): Template | undefined {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    return templates[Number(trimmed) - 1];
  }
  return templates.find((template) => template.name === trimmed);
}

function formatTemplateLine(template: Template, index: number): string {
  const description = template.description ? ` - ${template.description}` : "";
  return `  ${index + 1}) ${template.name}${description}\n`;
}

/**
 * Interactive loop: list templates, then instantiate, show or delete one.
 */
export async function runMenu(ctx: ActionContext, options: MenuOptions): Promise<void> {
  const { prompter, write, cwd } = options;

  for (;;) {
    const listed = await listTemplates(ctx);
    if (!listed.ok) {
      write(`${listed.message}\n`);
      return;
    }
    const templates = listed.value;

    if (templates.length === 0) {
      write('No templates yet. Capture one with "dirplate capture [name] [folder]".\n');
    } else {
      write("Templates:\n");
      templates.forEach((template, index) => write(formatTemplateLine(template, index)));
    }

    const action = parseMenuAction(await prompter.ask("[n]ew, [t]ree, [d]elete, [q]uit:"));
    if (action === "quit") return;
    if (action === undefined) {
      write("Unknown choice.\n");
      continue;
    }
    if (templates.length === 0) {
      write("There are no templates to choose from.\n");
      continue;
    }

    const choice = await prompter.ask("Template (name or number):");
    if (choice === undefined) return;
    const template = resolveTemplateChoice(choice, templates);
    if (!template) {
      write(`No template matches "${choice}".\n`);
      continue;
    }

    if (action === "tree") {
      const shown = await showTemplate(ctx, template.name);
      write(shown.ok ? `${template.name}/\n${shown.value.tree}\n` : `${shown.message}\n`);
      continue;
    }

    if (action === "delete") {
      if (await prompter.confirm(`Delete template "${template.name}"?`)) {
        const removed = await removeTemplate(ctx, template.name);
        write(removed.ok ? `Template ${template.name} deleted.\n` : `${removed.message}\n`);
      } else {
        write("Aborted.\n");
      }
      continue;
    }

    const location = await prompter.ask("Create in:", cwd);
    if (location === undefined) return;
    const dirName = await prompter.ask("Folder name:", template.name);
    if (dirName === undefined) return;

    const created = await instantiateTemplate(ctx, {
      template: template.name,
      location: path.resolve(cwd, location),
      dirName,
    });
    write(
      created.ok
        ? `Created ${created.value.destPath} from ${template.name} (${formatCopyStats(created.value.stats)}).\n`
        : `${created.message}\n`,
    );
  }
}
