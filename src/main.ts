import { loadConfig, type AppConfig, type TradingMode } from './config.js';
import { ConfigInvalidError } from './errors.js';
import { createChildLogger } from './logger.js';
import { getDb, closeDb } from './db/database.js';
import { OrderJournal } from './db/order-journal.js';
import { ControlLoop } from './engine/control-loop.js';
import { HedgeStateMachine } from './engine/hedge-state-machine.js';
import { startStatusReport, statusLine } from './engine/scheduler.js';
import { BybitHttpClient } from './exchange/bybit/client.js';
import { BybitExchange } from './execution/bybit-api.js';
import { PaperExchange } from './execution/paper-exchange.js';
import { Notifier } from './notification/notifier.js';
import { TriggerTracker } from './risk/trigger-tracker.js';
import { AuditLog } from './safety/audit-log.js';
import { HEDGE_SIDES } from './types/index.js';

const log = createChildLogger('main');

/** 종료 시 텔레그램 큐를 기다리는 최대 시간 */
const SHUTDOWN_FLUSH_MS = 5000;

// ── CLI 인자 파싱 ──
function parseMode(): TradingMode | undefined {
  const idx = process.argv.indexOf('--mode');
  const value = idx !== -1 ? process.argv[idx + 1]?.toUpperCase() : undefined;
  if (value === 'PAPER' || value === 'LIVE') return value;
  return undefined;
}

function readConfig(): AppConfig {
  const mode = parseMode();
  try {
    return loadConfig(mode ? { ...process.env, MODE: mode } : process.env);
  } catch (err) {
    if (err instanceof ConfigInvalidError) {
      log.fatal({ issues: err.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

/** --probe: 시세(및 LIVE면 포지션) 1회 조회 후 종료 */
async function probe(config: AppConfig, bybit: BybitExchange): Promise<void> {
  for (const symbol of [config.hedge.symbolLong, config.hedge.symbolShort]) {
    const price = await bybit.getMarkPrice(symbol);
    if (price.ok) log.info({ symbol, markPrice: price.value }, 'Mark price');
    else log.error({ symbol, err: price.error.message }, 'Mark price unavailable');

    if (config.mode === 'LIVE') {
      const position = await bybit.getPosition(symbol);
      if (position.ok) log.info({ ...position.value }, 'Position');
      else log.error({ symbol, err: position.error.message }, 'Position unavailable');
    }
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const { mode, hedge, loop: loopConfig } = config;
  log.info(
    {
      mode,
      long: hedge.symbolLong,
      short: hedge.symbolShort,
      size: hedge.usdPositionSize,
      max: hedge.maxUsdPosition,
      trigger: hedge.triggerDropPct,
      scaleIn: hedge.enableScaleIn ? `${hedge.scaleInLegs} legs / ${hedge.scaleInDropStep}%` : 'off',
      basis: hedge.triggerBasis,
    },
    'Starting pair hedger',
  );

  const client = new BybitHttpClient({
    baseUrl: config.bybit.baseUrl,
    apiKey: config.bybit.apiKey,
    apiSecret: config.bybit.apiSecret,
    recvWindow: config.bybit.recvWindow,
    timeoutMs: loopConfig.callTimeoutMs,
  });
  const bybit = new BybitExchange(client, { fillTimeoutMs: loopConfig.fillTimeoutMs });

  if (process.argv.includes('--probe')) {
    await probe(config, bybit);
    return;
  }

  // ── DB / 안전장치 ──
  const db = getDb();
  const audit = new AuditLog(db, mode);
  const journal = new OrderJournal(db, mode);
  const notifier = new Notifier(config.telegram);

  const exchange = mode === 'LIVE' ? bybit : new PaperExchange(bybit, { slippageBps: config.paper.slippageBps });
  const machine = new HedgeStateMachine(hedge, { tracker: new TriggerTracker(), audit, notifier });
  const controlLoop = new ControlLoop(
    { machine, prices: bybit, exchange, journal, audit, notifier },
    { ...loopConfig, orderTimeoutMs: loopConfig.callTimeoutMs + loopConfig.fillTimeoutMs },
  );

  audit.info('main', 'BOT_STARTED', `mode=${mode} long=${hedge.symbolLong} short=${hedge.symbolShort}`);
  notifier.notifyStartup(mode, hedge.symbolLong, hedge.symbolShort);
  const statusTask = startStatusReport(config.statusReportCron, machine);

  const running = controlLoop.run().catch((err: unknown) => {
    log.fatal({ err }, 'Control loop crashed');
  });

  // ── Graceful shutdown ──
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    controlLoop.stop();
    await running;
    statusTask.stop();

    for (const side of HEDGE_SIDES) log.info(statusLine(machine.snapshot(side)));
    audit.info('main', 'SHUTDOWN', signal);
    notifier.notifyShutdown();
    await notifier.flush(SHUTDOWN_FLUSH_MS);

    closeDb();
    log.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });
  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });

  // ── STDIN 제어 (c: 청산, r: 재개, q: 종료) ──
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('data', (data) => {
      const key = data.toString();
      if (key === 'c' || key === 'C') {
        log.warn('Manual close requested for both sides');
        for (const side of HEDGE_SIDES) machine.requestClose(side);
      }
      if (key === 'r' || key === 'R') {
        for (const side of HEDGE_SIDES) {
          if (machine.resume(side)) log.info({ side }, 'Side resumed from keyboard');
        }
      }
      if (key === 'q' || key === '\u0003') { // q or Ctrl+C
        shutdown('keyboard').catch(() => process.exit(1));
      }
    });

    console.log('');
    console.log(`  Mode: ${mode}  ${hedge.symbolLong} / ${hedge.symbolShort}`);
    console.log('  Keys: [c] Close both sides  [r] Resume halted sides  [q] Quit');
    console.log('');
  }

  log.info({ notifier: notifier.enabled }, 'Hedger running');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
