import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { pickUserAgent, randomViewport } from '../utils/userAgents';
import { silentLogger, type Logger } from '../utils/logger';

export type BrowserParams = {
  headless: boolean;
  navTimeoutMs: number;
  channel?: string | null;
  executablePath?: string | null;
  proxy?: string | null;
  logger?: Logger;
};

export async function openBrowser(params: BrowserParams): Promise<{ browser: Browser; context: BrowserContext }> {
  const logger = params.logger ?? silentLogger;
  const userAgent = pickUserAgent();
  const viewport = randomViewport();
  const proxy = params.proxy ? { server: params.proxy } : undefined;

  logger.info(`Abrindo navegador headless=${params.headless} viewport=${viewport.width}x${viewport.height}`);
  const browser = await chromium.launch({
    headless: params.headless,
    channel: params.channel ?? undefined,
    executablePath: params.executablePath ?? undefined,
    proxy,
    args: ['--disable-blink-features=AutomationControlled'],
    // sinais ficam com a CLI, que pausa a coleta e salva o checkpoint
    handleSIGINT: false,
    handleSIGTERM: false,
    handleSIGHUP: false,
  });
  const context = await browser.newContext({
    userAgent,
    viewport,
    locale: 'pt-BR',
    timezoneId: 'America/Sao_Paulo',
  });
  context.setDefaultNavigationTimeout(params.navTimeoutMs);
  return { browser, context };
}

export async function humanDelay(min = 300, max = 1200) {
  const jitter = Math.random() * 200;
  const ms = Math.floor(min + Math.random() * (max - min) + jitter);
  await new Promise(r => setTimeout(r, ms));
}

export async function scrollIncremental(page: Page, steps = 3) {
  const height = await page.evaluate(() => window.innerHeight);
  for (let i = 0; i < steps; i++) {
    await page.mouse.wheel(0, height);
    await humanDelay(500, 1500);
  }
}

export async function tryClosePopups(page: Page, logger: Logger = silentLogger) {
  const selectors = [
    '#onetrust-accept-btn-handler',
    'button:has-text("Aceitar")',
    'button:has-text("Entendi")',
    'button:has-text("Fechar")',
    'button[aria-label="Fechar"]',
  ];
  for (const sel of selectors) {
    const button = page.locator(sel).first();
    const visible = await button.isVisible().catch(() => false);
    if (!visible) continue;
    await button.click({ timeout: 1500 }).catch((e: unknown) => {
      logger.debug({ sel, err: e instanceof Error ? e.message : String(e) }, 'Popup não fechou');
    });
  }
}
