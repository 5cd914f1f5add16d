import readline from 'readline';
import { RelayLocation } from '../models';
import { RelayPolicy } from '../models/capabilities';

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Asks on the terminal before tunnelling through a relay. Without a TTY the
 * answer is no.
 */
export const promptPolicy: RelayPolicy = {
  approve: async (location: RelayLocation) => {
    if (!process.stdin.isTTY) {
      return false;
    }
    const answer = await ask(`Tunnel through relay ${location.name} (scope ${location.scope})? [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  },
};
