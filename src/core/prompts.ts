import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName = 'intent_classifier' | 'slot_extractor' | 'extraction_retry';

const FILES: Record<PromptName, string> = {
  intent_classifier: 'intent_classifier.md',
  slot_extractor: 'slot_extractor.md',
  extraction_retry: 'extraction_retry.md',
};

let loading: Promise<Record<PromptName, string>> | undefined;

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

async function loadAll(): Promise<Record<PromptName, string>> {
  const base = promptsDir();
  const [intent, slots, retry] = await Promise.all([
    readFile(path.join(base, FILES.intent_classifier), 'utf-8'),
    readFile(path.join(base, FILES.slot_extractor), 'utf-8'),
    readFile(path.join(base, FILES.extraction_retry), 'utf-8'),
  ]);
  return { intent_classifier: intent, slot_extractor: slots, extraction_retry: retry };
}

export async function preloadPrompts(): Promise<void> {
  await getPrompts();
}

function getPrompts(): Promise<Record<PromptName, string>> {
  if (!loading) {
    loading = loadAll();
    // a failed load is retried on the next call
    loading.catch(() => {
      loading = undefined;
    });
  }
  return loading;
}

export async function getPrompt(name: PromptName): Promise<string> {
  const prompts = await getPrompts();
  return prompts[name];
}

/** Replaces `{name}` placeholders; unknown placeholders are left as they are. */
export function fillPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}
