import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import pc from 'picocolors';

export interface Prompter {
    ask(question: string): Promise<string>;
    print(line: string): void;
    close(): void;
}

/**
 * Terminal prompter. A readline interface lives only for the duration of one
 * question, so Ctrl+C reaches the process handlers while downloads run.
 */
export class ReadlinePrompter implements Prompter {
    async ask(question: string): Promise<string> {
        const rl = createInterface({ input: stdin, output: stdout });
        // Ctrl+C at a prompt leaves the program
        rl.on('SIGINT', () => {
            rl.close();
            stdout.write('\n');
            process.exit(130);
        });
        try {
            const answer = await rl.question(pc.cyan(question));
            return answer.trim();
        } finally {
            rl.close();
        }
    }

    print(line: string): void {
        console.log(line);
    }

    close(): void {
        stdin.pause();
    }
}
