import type { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import ora from 'ora';
import { getContext, closeContext } from '../context.js';
import { printSuccess, printError, printJson, isJsonOutput } from '../output.js';
import type { GenerationRequest } from '../../generation/validate.js';

interface GenerateOptions {
  width?: string;
  height?: string;
  negative?: string;
  model?: string;
  steps?: string;
  out?: string;
}

function toInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <prompt>')
    .description('Generate one image through the credential pool')
    .option('-W, --width <px>', 'image width')
    .option('-H, --height <px>', 'image height')
    .option('-n, --negative <prompt>', 'negative prompt')
    .option('-m, --model <id>', 'model id')
    .option('-s, --steps <n>', 'inference steps')
    .option('-o, --out <file>', 'write the image to this file when it comes back as base64')
    .action(async (prompt: string, options: GenerateOptions) => {
      const ctx = await getContext();
      const request: GenerationRequest = {
        prompt,
        width: toInt(options.width),
        height: toInt(options.height),
        negativePrompt: options.negative,
        model: options.model,
        steps: toInt(options.steps),
      };

      const spinner = isJsonOutput() ? null : ora('Generating image...').start();
      try {
        const result = await ctx.orchestrator.generate(request);
        spinner?.stop();

        if (!result.ok) {
          printError(`Generation failed (${result.code}): ${result.error}`);
          return;
        }

        if (options.out && result.imageBase64) {
          await writeFile(options.out, Buffer.from(result.imageBase64, 'base64'));
        }

        if (isJsonOutput()) {
          printJson({
            success: true,
            image_url: result.imageUrl,
            file: options.out && result.imageBase64 ? options.out : undefined,
          });
          return;
        }

        if (options.out && result.imageBase64) {
          printSuccess(`Image written to ${options.out}`);
        } else if (result.imageUrl) {
          printSuccess(`Image URL: ${result.imageUrl}`);
        } else {
          printSuccess('Image generated (pass --out <file> to save the base64 payload)');
        }
      } finally {
        spinner?.stop();
        await closeContext(ctx);
      }
    });
}
