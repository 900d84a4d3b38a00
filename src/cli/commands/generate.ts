import type { Command } from 'commander';
import { status } from '@grpc/grpc-js';
import { GenerationClient, isServiceError } from '../../rpc/client.js';
import type { GenerateRequestMessage } from '../../types/rpc.types.js';

interface GenerateOptions {
  server: string;
  temperature?: string;
  maxTokens?: string;
  topP?: string;
  stream?: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <prompt>')
    .description('Send a prompt to a running service and print the result')
    .option('--server <address>', 'Server address', 'localhost:50051')
    .option('--temperature <t>', 'Sampling temperature')
    .option('--max-tokens <n>', 'Maximum tokens to generate')
    .option('--top-p <p>', 'Nucleus sampling threshold')
    .option('--stream', 'Use the streaming RPC')
    .action(async (prompt: string, opts: GenerateOptions) => {
      const client = new GenerationClient({ address: opts.server });
      const request: GenerateRequestMessage = {
        prompt,
        parameters: {
          ...(opts.temperature !== undefined && { temperature: parseFloat(opts.temperature) }),
          ...(opts.maxTokens !== undefined && { max_tokens: parseInt(opts.maxTokens, 10) }),
          ...(opts.topP !== undefined && { top_p: parseFloat(opts.topP) }),
        },
      };

      try {
        if (opts.stream) {
          for await (const message of client.generateStream(request)) {
            process.stdout.write(message.text);
          }
        } else {
          const response = await client.generate(request);
          process.stdout.write(response.text);
        }
        process.stdout.write('\n');
      } catch (err) {
        if (!isServiceError(err)) throw err;
        process.stderr.write(`RPC error: ${status[err.code]}: ${err.details}\n`);
        process.exitCode = 1;
      } finally {
        client.close();
      }
    });
}
