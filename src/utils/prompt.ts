import * as readline from 'readline';

/**
 * Ask a yes/no question on the terminal. Without an interactive terminal
 * the answer is always no.
 */
export async function confirm(question: string, input: NodeJS.ReadStream = process.stdin): Promise<boolean> {
  if (!input.isTTY) {
    return false;
  }

  const rl = readline.createInterface({ input, output: process.stdout });
  try {
    const answer = await new Promise<string>(resolve => rl.question(`${question} (yes/no): `, resolve));
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}
