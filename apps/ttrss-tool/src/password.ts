import { createInterface } from "node:readline";

import type { TextSink } from "./io";

export const PASSWORD_PROMPT = "password (will be echoed): ";

// Prompts until a non-empty line arrives; end of input is an error.
export async function readPassword(input: NodeJS.ReadableStream, output: TextSink): Promise<string> {
  const lines = createInterface({ input, terminal: false });
  try {
    output.write(PASSWORD_PROMPT);
    for await (const line of lines) {
      if (line !== "") {
        return line;
      }
      output.write(PASSWORD_PROMPT);
    }
  } finally {
    lines.close();
  }
  throw new Error("failed reading password: end of input");
}
