import dotenv from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';
import { ConfigInvalidError } from './errors.js';
import { BYBIT_REST_BASE } from './exchange/bybit/endpoints.js';

dotenv.config();

export function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export type TradingMode = 'PAPER' | 'LIVE';

const SYMBOL_RE = /^[A-Z0-9]+$/;

const envBool = z.preprocess(
  (v) => (typeof v === 'string' ? ['true', '1', 'yes'].includes(v.trim().toLowerCase()) : v),
  z.boolean(),
);

const hedgeSchema = z
  .object({
    symbolLong: z.string().regex(SYMBOL_RE, 'must be an upper-case instrument id such as BTCUSDT'),
    symbolShort: z.string().regex(SYMBOL_RE, 'must be an upper-case instrument id such as BTCUSDT'),
    usdPositionSize: z.coerce.number().positive(),
    maxUsdPosition: z.coerce.number().positive().optional(),
    triggerDropPct: z.coerce.number().gt(0).lt(100),
    enableScaleIn: envBool,
    scaleInLegs: z.coerce.number().int(),
    scaleInDropStep: z.coerce.number(),
    triggerBasis: z.enum(['symbol', 'ratio']),
    capScope: z.enum(['side', 'combined']),
    minOrderUsd: z.coerce.number().min(0),
  })
  // MAX_USD_POSITION 미지정 시 전체 레그 합으로
  .transform((h) => ({
    ...h,
    maxUsdPosition: h.maxUsdPosition ?? h.usdPositionSize * (h.enableScaleIn ? h.scaleInLegs : 1),
  }))
  .superRefine((h, ctx) => {
    if (h.symbolLong === h.symbolShort) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['symbolShort'], message: 'must differ from symbolLong' });
    }
    if (h.maxUsdPosition < h.usdPositionSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxUsdPosition'],
        message: `must be >= usdPositionSize (${h.usdPositionSize})`,
      });
    }
    if (h.enableScaleIn) {
      if (h.scaleInLegs < 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scaleInLegs'], message: 'must be >= 1 when scale-in is enabled' });
      }
      if (!(h.scaleInDropStep > 0)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scaleInDropStep'], message: 'must be > 0 when scale-in is enabled' });
      }
    }
  });

const loopSchema = z.object({
  pollIntervalMs: z.coerce.number().int().positive(),
  maxRetries: z.coerce.number().int().min(0),
  backoffBaseMs: z.coerce.number().int().min(0),
  backoffMaxMs: z.coerce.number().int().min(0),
  callTimeoutMs: z.coerce.number().int().positive(),
  fillTimeoutMs: z.coerce.number().int().positive(),
});

const appConfigSchema = z
  .object({
    mode: z.enum(['PAPER', 'LIVE']),
    hedge: hedgeSchema,
    loop: loopSchema,
    bybit: z.object({
      apiKey: z.string(),
      apiSecret: z.string(),
      baseUrl: z.string().url(),
      recvWindow: z.coerce.number().int().positive(),
    }),
    paper: z.object({
      slippageBps: z.coerce.number().min(0),
    }),
    db: z.object({ path: z.string().min(1) }),
    log: z.object({ level: z.string() }),
    telegram: z.object({
      enabled: envBool,
      botToken: z.string(),
      chatId: z.string(),
    }),
    statusReportCron: z.string().refine((expr) => cron.validate(expr), 'invalid cron expression'),
  })
  .superRefine((c, ctx) => {
    if (c.mode === 'LIVE' && (!c.bybit.apiKey || !c.bybit.apiSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bybit'],
        message: 'BYBIT_API_KEY and BYBIT_API_SECRET are required in LIVE mode',
      });
    }
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
export type HedgeConfig = AppConfig['hedge'];
export type LoopConfig = AppConfig['loop'];
export type TelegramSettings = AppConfig['telegram'];

interface BotConfigOverride {
  symbolLong: string;
  symbolShort: string;
  triggerDropPct: string;
  usdPositionSize: string;
  enableScaleIn: string;
  scaleInLegs: string;
  scaleInDropStep: string;
}

/**
 * 단일 문자열 설정: "SYMBOL_LONG|SYMBOL_SHORT|TRIGGER_PCT|POSITION_SIZE|SCALE_IN|LEGS|STEP"
 * 예) "HYPEUSDT|JASMYUSDT|12|1500|true|3|2"
 */
export function parseBotConfig(value: string): BotConfigOverride {
  const parts = value.split('|').map((p) => p.trim());
  if (parts.length < 7) {
    throw new ConfigInvalidError([
      `BOT_CONFIG: expected 7 fields "LONG|SHORT|TRIGGER_PCT|POSITION_SIZE|SCALE_IN|LEGS|STEP", got ${parts.length}`,
    ]);
  }
  const [
    symbolLong = '',
    symbolShort = '',
    triggerDropPct = '',
    usdPositionSize = '',
    enableScaleIn = '',
    scaleInLegs = '',
    scaleInDropStep = '',
  ] = parts;
  return { symbolLong, symbolShort, triggerDropPct, usdPositionSize, enableScaleIn, scaleInLegs, scaleInDropStep };
}

/**
 * 환경변수 → 검증된 설정. 잘못된 조합은 ConfigInvalidError (모든 이슈 나열).
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = (key: string, fallback: string): string => source[key] ?? fallback;
  const bot = source['BOT_CONFIG'] ? parseBotConfig(source['BOT_CONFIG']) : null;

  const raw = {
    mode: e('MODE', 'PAPER').toUpperCase(),
    hedge: {
      symbolLong: bot?.symbolLong ?? e('SYMBOL_LONG', 'MNTUSDT'),
      symbolShort: bot?.symbolShort ?? e('SYMBOL_SHORT', 'RAYDIUMUSDT'),
      usdPositionSize: bot?.usdPositionSize ?? e('USD_POSITION_SIZE', '1500'),
      // BOT_CONFIG에는 상한 필드가 없다: MAX_USD_POSITION이 없으면 레그 1개 금액이 상한
      maxUsdPosition: source['MAX_USD_POSITION'] || bot?.usdPositionSize || undefined,
      triggerDropPct: bot?.triggerDropPct ?? e('TRIGGER_DROP_PCT', '12'),
      enableScaleIn: bot?.enableScaleIn ?? e('ENABLE_SCALE_IN', 'true'),
      scaleInLegs: bot?.scaleInLegs ?? e('SCALE_IN_LEGS', '3'),
      scaleInDropStep: bot?.scaleInDropStep ?? e('SCALE_IN_DROP_STEP', '2'),
      triggerBasis: e('TRIGGER_BASIS', 'symbol'),
      capScope: e('MAX_POSITION_SCOPE', 'side'),
      minOrderUsd: e('MIN_ORDER_USD', '1'),
    },
    loop: {
      pollIntervalMs: e('POLL_INTERVAL_MS', '30000'),
      maxRetries: e('MAX_RETRIES', '3'),
      backoffBaseMs: e('BACKOFF_BASE_MS', '1000'),
      backoffMaxMs: e('BACKOFF_MAX_MS', '30000'),
      callTimeoutMs: e('CALL_TIMEOUT_MS', '10000'),
      fillTimeoutMs: e('FILL_TIMEOUT_MS', '30000'),
    },
    bybit: {
      apiKey: e('BYBIT_API_KEY', ''),
      apiSecret: e('BYBIT_API_SECRET', ''),
      baseUrl: e('BYBIT_BASE_URL', BYBIT_REST_BASE),
      recvWindow: e('BYBIT_RECV_WINDOW', '5000'),
    },
    paper: {
      slippageBps: e('PAPER_SLIPPAGE_BPS', '5'),
    },
    db: { path: e('DB_PATH', './data/hedge.db') },
    log: { level: e('LOG_LEVEL', 'info') },
    telegram: {
      enabled: e('TELEGRAM_ENABLED', 'false'),
      botToken: e('TELEGRAM_BOT_TOKEN', ''),
      chatId: e('TELEGRAM_CHAT_ID', ''),
    },
    statusReportCron: e('STATUS_REPORT_CRON', '*/15 * * * *'),
  };

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return parsed.data;
}
