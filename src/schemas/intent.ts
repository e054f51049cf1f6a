import { z } from 'zod';

export const Intent = z.enum(['SEARCH', 'SELECT', 'CONFIRM', 'CANCEL', 'UNKNOWN']);
export type IntentT = z.infer<typeof Intent>;

export const INTENT_LABELS: readonly IntentT[] = Intent.options;
