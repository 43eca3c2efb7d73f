/**
 * marknote create / marknote new - Create a new note.
 */

import { Command } from "commander";
import * as path from "node:path";
import { collectList, openStore, runAction } from "./shared.js";

interface CreateOptions {
  category?: string;
  tag: string[];
  link: string[];
  body?: string;
}

function makeCreateAction() {
  return (title: string, options: CreateOptions, command: Command) => {
    runAction(command, () => {
      const { store, location, globals } = openStore(command);

      const note = store.create({
        title,
        category: options.category,
        tags: options.tag.length > 0 ? options.tag : undefined,
        linkedNotes: options.link.length > 0 ? options.link : undefined,
        body: options.body,
      });

      if (globals.json) {
        console.log(
          JSON.stringify({
            status: "created",
            title: note.frontmatter.title,
            category: note.identity.category ?? null,
            path: note.path ? path.relative(location.rootPath, note.path) : null,
            tags: note.frontmatter.tags ?? [],
            linked_notes: note.frontmatter.linked_notes ?? [],
          }),
        );
      } else {
        console.log(note.frontmatter.title);
        if (!globals.quiet && note.path) {
          console.log(path.relative(process.cwd(), note.path));
        }
      }
    });
  };
}

function defineCreate(name: string, description: string): Command {
  return new Command(name)
    .description(description)
    .argument("<title>", "note title")
    .option("-c, --category <name>", "category (subdirectory) for the note")
    .option("--tag <tag>", "add tag (repeatable, comma-separated)", collectList, [])
    .option(
      "--link <note>",
      "link to another note by title or category/title (repeatable)",
      (value: string, previous: string[]) => previous.concat([value]),
      [],
    )
    .option("--body <text>", "note body (defaults to a title heading)")
    .action(makeCreateAction());
}

export function createCommand(): Command {
  return defineCreate("create", "Create a new note");
}

// Alias: marknote new
export function newCommand(): Command {
  return defineCreate("new", "Create a new note (alias for create)");
}
