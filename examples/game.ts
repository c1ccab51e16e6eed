/**
 * Example: a small adventure game driven by the model.
 *
 * The model plays a wizard and can look up inventories and places, cast two
 * spells and keep markers on a map. Every command is an ordinary function;
 * the session sends their schemas with each request and runs the calls the
 * model makes.
 *
 * Usage:
 *   OPENAI_API_KEY=... npx tsx examples/game.ts
 *
 * Settings are read from the environment (or a `.env` file): see
 * `loadConfig` in @chatcmd/chat-client.
 */

import "dotenv/config";
import * as readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import pino from "pino";
import { loadConfig } from "@chatcmd/chat-client";
import { ChatSession, defineCommand, param, t } from "@chatcmd/command-loop";
import type { Command, Infer } from "@chatcmd/command-loop";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const Point = t.record({
  name: "Point",
  description: "A 2D point",
  fields: { x: t.number(), y: t.number() },
});

const Marker = t.record({
  name: "Marker",
  description: "A named point on the map",
  fields: { name: t.string(), point: Point },
});

type Marker = Infer<typeof Marker>;

const SYSTEM_PROMPT = [
  "You are a young wizard exploring a castle with a friend.",
  "You talk to your friend in character and never break it.",
  "Use the available spells and the map when they help.",
].join(" ");

const INVENTORIES: Readonly<Record<string, readonly string[]>> = {
  Harry: ["Wand", "Broom", "Cloak"],
  Ron: ["Wand", "Rat"],
  Hermione: ["Wand", "Cat", "Book"],
};

const LOCATIONS: Readonly<Record<string, Infer<typeof Point>>> = {
  Hogwarts: { x: 0, y: 0 },
  "Diagon Alley": { x: 1, y: 1 },
  "Forbidden Forest": { x: 2, y: 2 },
};

// ---------------------------------------------------------------------------
// Game
// ---------------------------------------------------------------------------

class Game {
  readonly markers: Marker[] = [];

  commands(): Command[] {
    return [
      defineCommand({
        name: "get_inventory",
        description: "Get the inventory of a character",
        parameters: {
          character: param(
            t.string(),
            "The character whose inventory to get. One of: 'Harry', 'Ron', 'Hermione'",
          ),
          max_items: param(t.integer(), "The maximum number of items to return", {
            default: 10,
          }),
        },
        returns: t.list(t.string()),
        handler: ({ character, max_items }) =>
          (INVENTORIES[character] ?? []).slice(0, max_items),
      }),
      defineCommand({
        name: "alohomora",
        description: "Unlock the door",
        parameters: {},
        handler: () => {
          console.log("[COMMAND] Alohomora!");
        },
      }),
      defineCommand({
        name: "expelliarmus",
        description: "Disarm the target",
        parameters: { target: param(t.string(), "The target to disarm") },
        handler: ({ target }) => {
          console.log(`[COMMAND] Expelliarmus ${target}!`);
        },
      }),
      defineCommand({
        name: "get_location_coordinates",
        description: "Get the coordinates of a location",
        parameters: {
          location: param(
            t.optional(t.string()),
            "The location. One of: 'Hogwarts', 'Diagon Alley', 'Forbidden Forest'. Defaults to the current location.",
            { default: undefined },
          ),
        },
        returns: Point,
        handler: ({ location }) =>
          (location !== undefined ? LOCATIONS[location] : undefined) ?? {
            x: 100,
            y: 100,
          },
      }),
      defineCommand({
        name: "get_markers",
        description: "Get the markers on the map",
        parameters: {},
        returns: t.list(Marker),
        handler: () => this.markers,
      }),
      defineCommand({
        name: "set_a_mark_on_the_map",
        description: "Set a mark on the map",
        parameters: { marker: param(Marker, "The mark to set") },
        handler: ({ marker }) => {
          console.log(
            `[COMMAND] Set a mark on the map at (${marker.point.x}, ${marker.point.y}) with ${marker.name}!`,
          );
          this.markers.push(marker);
        },
      }),
    ];
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({ name: "game", level: config.logLevel });
  const session = ChatSession.fromConfig(config, {
    systemPrompt: SYSTEM_PROMPT,
    logger,
  });
  const commands = new Game().commands();
  const rl = readline.createInterface({ input, output });

  logger.info({ model: config.model }, "starting");
  try {
    for (;;) {
      const prompt = (await rl.question("You: ")).trim();
      if (prompt === "" || prompt === "exit") break;

      for await (const delta of session.sendAndStream(prompt, commands)) {
        output.write(delta);
      }
      output.write("\n");
    }
  } finally {
    rl.close();
    await session.close();
  }
}

main().catch((error: unknown) => {
  console.error("Example failed:", error);
  process.exit(1);
});
