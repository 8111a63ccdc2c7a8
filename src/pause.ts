/// # pause before exit
///
/// when the script is launched by double-clicking, the terminal window
/// closes as soon as it exits, taking the output with it. so by default
/// we hold the window open until the user hits enter.

import { createInterface } from "readline";

export interface PauseStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export const pausePrompt = "Press any key to continue...";

/// resolves on the next line of input, or when input ends (a closed or
/// redirected stdin shouldn't hang the process forever).
export function waitForKeypress(
  prompt: string = pausePrompt,
  streams: PauseStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const rl = createInterface({ input: streams.input, output: streams.output });

  return new Promise((resolve) => {
    rl.once("close", () => resolve());
    rl.question(prompt, () => rl.close());
  });
}
