// src/confirm.ts
import { createInterface } from "node:readline/promises";

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/** Asks on the terminal; anything but y/yes declines. */
export class PromptConfirmer implements Confirmer {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
  ) {}

  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return isYes(await rl.question(`${question} [y/N] `));
    } finally {
      rl.close();
    }
  }
}

// --yes
export const ALWAYS_CONFIRM: Confirmer = {
  confirm: async () => true,
};
