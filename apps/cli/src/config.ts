import { z } from 'zod';
import { DUPLICATE_DEFAULTS } from '@fiscal-intake/types';
import {
  FileLedgerStore,
  InMemoryLedgerStore,
  SupabaseLedgerStore,
  type LedgerStore,
  type SupabaseConfig,
} from '@fiscal-intake/ledger';

type Env = Record<string, string | undefined>;

export const LEDGER_BACKENDS = ['file', 'supabase', 'memory'] as const;
export type LedgerBackend = (typeof LEDGER_BACKENDS)[number];

const envFlag = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z
  .object({
    LEDGER_BACKEND: z.enum(LEDGER_BACKENDS).default('file'),
    LEDGER_FILE: z.string().optional(),
    IMPORTER_TAX_ID: z.string().default(''),
    DISTRIBUTOR_TAX_ID: z.string().default(''),
    DUPLICATE_WINDOW_DAYS: z.coerce.number().int().nonnegative().default(DUPLICATE_DEFAULTS.WINDOW_DAYS),
    DUPLICATE_TOLERANCE_PERCENT: z.coerce.number().nonnegative().default(DUPLICATE_DEFAULTS.TOLERANCE_PERCENT),
    SESSION_TTL_MINUTES: z.coerce.number().positive().optional(),
    FISCAL_VERBOSE: envFlag,
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_ANON_KEY: z.string().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
  })
  .superRefine((vars, ctx) => {
    if (vars.LEDGER_BACKEND !== 'supabase') return;
    for (const name of ['SUPABASE_URL', 'SUPABASE_ANON_KEY'] as const) {
      if (vars[name] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: 'required by the supabase backend' });
      }
    }
  });

export interface AppConfig {
  ledgerBackend: LedgerBackend;
  ledgerFile: string | undefined;
  entities: { importer: string; distributor: string };
  windowDays: number;
  tolerancePercent: number;
  sessionTtlMs: number | undefined;
  verbose: boolean;
  /** Set when both the URL and the anon key are. */
  supabase: SupabaseConfig | undefined;
}

/** Unset and empty variables both fall back to their defaults. */
function withoutEmpty(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    ledgerBackend: vars.LEDGER_BACKEND,
    ledgerFile: vars.LEDGER_FILE,
    entities: { importer: vars.IMPORTER_TAX_ID, distributor: vars.DISTRIBUTOR_TAX_ID },
    windowDays: vars.DUPLICATE_WINDOW_DAYS,
    tolerancePercent: vars.DUPLICATE_TOLERANCE_PERCENT,
    sessionTtlMs: vars.SESSION_TTL_MINUTES === undefined ? undefined : vars.SESSION_TTL_MINUTES * 60_000,
    verbose: vars.FISCAL_VERBOSE,
    supabase:
      vars.SUPABASE_URL === undefined || vars.SUPABASE_ANON_KEY === undefined
        ? undefined
        : { url: vars.SUPABASE_URL, anonKey: vars.SUPABASE_ANON_KEY, serviceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY },
  };
}

/** Entities that are not configured never match, so nothing classifies as a transfer or sale. */
export function missingEntities(config: AppConfig): string[] {
  const missing: string[] = [];
  if (config.entities.importer === '') missing.push('IMPORTER_TAX_ID');
  if (config.entities.distributor === '') missing.push('DISTRIBUTOR_TAX_ID');
  return missing;
}

export function createLedgerStore(config: AppConfig): LedgerStore {
  switch (config.ledgerBackend) {
    case 'memory':
      return new InMemoryLedgerStore();
    case 'file':
      return new FileLedgerStore(config.ledgerFile);
    case 'supabase':
      if (config.supabase === undefined) {
        throw new Error('The supabase backend needs SUPABASE_URL and SUPABASE_ANON_KEY');
      }
      return SupabaseLedgerStore.fromConfig(config.supabase);
  }
}
