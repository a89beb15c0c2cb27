import {
  calculateDiamonds,
  getEfficiencyTip,
  getTierTable,
  optimizeBeans,
} from '../services/conversion/index.js';
import { parseBeans } from './parse.js';
import { renderConversion, renderOptimization, renderTierTable } from './render.js';

/**
 * Terminal I/O the CLI needs. Backed by node:readline in the script and
 * by a scripted fake in tests.
 */
export interface Prompt {
  question(query: string): Promise<string>;
  print(text: string): void;
}

export const USAGE = 'Usage: beans-calc <number_of_beans>';

const MENU = [
  '',
  'Options:',
  '1. Calculate conversion',
  '2. View tier table',
  '3. Optimize conversion',
  '4. Exit',
].join('\n');

/**
 * Conversion block plus tip for one amount, or the error line to print.
 */
export function describeConversion(beans: number): { ok: boolean; text: string } {
  const result = calculateDiamonds(beans);
  if (!result.success) {
    return { ok: false, text: '❌ Unable to calculate conversion!' };
  }
  return {
    ok: true,
    text: `\n${renderConversion(beans, result.data)}\n\n${getEfficiencyTip(beans)}`,
  };
}

/**
 * One-shot mode: `beans-calc 4000`. Returns the process exit code.
 */
export function runWithArgument(arg: string, print: (text: string) => void): number {
  const parsed = parseBeans(arg);
  if (!parsed.success) {
    print('❌ Please provide a valid number of beans!');
    print(USAGE);
    return 1;
  }

  const { ok, text } = describeConversion(parsed.data);
  print(text);
  return ok ? 0 : 1;
}

async function askBeans(prompt: Prompt): Promise<number | null> {
  const parsed = parseBeans(await prompt.question('\nEnter number of beans: '));
  if (!parsed.success) {
    prompt.print(`❌ ${parsed.error.message}`);
    return null;
  }
  return parsed.data;
}

/**
 * Menu loop. Resolves when the user picks Exit.
 */
export async function runInteractive(prompt: Prompt): Promise<void> {
  prompt.print('🔥 BEANS TO DIAMONDS CALCULATOR 🔥');
  prompt.print('Convert your beans to diamonds with tier-based efficiency rates');

  for (;;) {
    prompt.print(MENU);
    const choice = (await prompt.question('\nEnter your choice (1-4): ')).trim();

    switch (choice) {
      case '1': {
        const beans = await askBeans(prompt);
        if (beans !== null) prompt.print(describeConversion(beans).text);
        break;
      }
      case '2':
        prompt.print(`\n${renderTierTable(getTierTable())}`);
        break;
      case '3': {
        const beans = await askBeans(prompt);
        if (beans !== null) prompt.print(`\n${renderOptimization(beans, optimizeBeans(beans))}`);
        break;
      }
      case '4':
        prompt.print('\n👋 Thanks for using the Beans to Diamonds Calculator!');
        return;
      default:
        prompt.print('❌ Invalid choice! Please enter 1, 2, 3, or 4.');
    }
  }
}
