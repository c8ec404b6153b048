#!/usr/bin/env node
import { CommanderError } from "commander";
import { WhatsAppClient } from "./client/whatsapp-client.js";
import { buildProgram } from "./cli/program.js";
import { errorMessage } from "./utils/errors.js";

const program = buildProgram({
  createClient: (config) => new WhatsAppClient({ config }),
  write: (line) => console.log(line),
  waitForInterrupt: () =>
    new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
    }),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  // Commander has already printed its own usage errors and help
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  console.error(`[cli] ${errorMessage(err)}`);
  process.exitCode = 1;
});
