/**
 * Interactive demo — the agent with calculator and notepad tools
 */

import "dotenv/config";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import {
  Agent,
  AgentError,
  OpenAIEngine,
  createLogger,
  loadConfig,
  serializeTrace,
  type Outcome,
} from "../index.js";
import { createDemoTools } from "./tools.js";

const HELP = [
  "Commands:",
  "  /do <goal>           work toward a goal",
  "  /tell <question>     ask for an answer",
  "  /check <condition>   judge whether a condition holds",
  "  /redo                replay the last completed goal without the model",
  "  /trace               print the last trace as JSON",
  "  /reset               clear the conversation",
  "  /exit",
].join("\n");

function preview(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "..." : text;
}

async function main() {
  const config = loadConfig();
  if (!config.apiKey) {
    console.error("Error: OPENAI_API_KEY environment variable is not set.");
    console.log("Please create a .env file with OPENAI_API_KEY=your-key-here");
    process.exit(1);
  }

  const engine = new OpenAIEngine({
    model: config.model,
    apiKey: config.apiKey,
    baseURL: config.baseURL,
  });
  console.log(`Using model: ${config.model} @ ${config.baseURL ?? "OpenAI"}`);

  const agent = new Agent({
    engine,
    tools: createDemoTools(),
    logger: createLogger("taskpilot-demo", config.logLevel),
    toolTimeoutMs: config.toolTimeoutMs,
    reasoningTimeoutMs: config.reasoningTimeoutMs,
    onStep: ({ iteration, requests, results, thinking }) => {
      console.log(`  [Step ${iteration}]`);
      if (thinking) console.log(`    Thinking: ${preview(thinking, 120)}`);
      for (const req of requests) {
        console.log(`    -> ${req.name}(${preview(JSON.stringify(req.arguments), 80)})`);
      }
      for (const res of results) {
        console.log(`    <- ${res.name}: ${preview(res.description, 100)}`);
      }
    },
  });

  let last: Outcome | undefined;

  console.log(`\nInteractive mode ready.\n${HELP}\n`);

  const rl = readline.createInterface({ input, output });
  try {
    while (true) {
      const line = (await rl.question("You> ")).trim();
      if (!line) continue;
      if (line === "/exit") break;

      const [command, ...rest] = line.split(" ");
      const text = rest.join(" ").trim();

      try {
        switch (command) {
          case "/do": {
            last = await agent.do(text, { maxIterations: config.maxIterations });
            console.log(`\nCompleted in ${last.iterations} iteration(s): ${last.feedback}`);
            console.log(`\n${last.summary}\n`);
            break;
          }
          case "/tell":
            console.log(`\n${await agent.tell(text)}\n`);
            break;
          case "/check": {
            const verdict = await agent.check(text);
            console.log(`\n${verdict.toString()}\n`);
            break;
          }
          case "/redo": {
            if (!last) {
              console.log("Nothing to replay yet.\n");
              break;
            }
            const replayed = await agent.redo(last.trace);
            console.log(`\n${replayed.feedback}\n`);
            break;
          }
          case "/trace":
            console.log(last ? `\n${serializeTrace(last.trace)}\n` : "No trace yet.\n");
            break;
          case "/reset":
            agent.reset();
            console.log("Conversation reset.\n");
            break;
          default:
            console.log(HELP + "\n");
        }
      } catch (error) {
        if (error instanceof AgentError) {
          console.error(`\n${error.name}: ${error.message}\n`);
        } else {
          console.error("Error during agent run:", error);
        }
      }
    }
  } finally {
    rl.close();
  }
}

main().catch(console.error);
