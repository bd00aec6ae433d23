import path from 'path';
import { chromium, type BrowserContext } from 'playwright-core';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { Logger } from './logger.js';
import type { AvailabilityChecker, CheckedOccurrence, CheckerFactory, CheckResult, Leg } from './types.js';

export type BrowserCheckerOptions = {
  entryUrl: string;
  availabilityUrl: string;
  loginUrl?: string;
  username?: string;
  password?: string;
  headful: boolean;
  channel?: string;
  userDataDir: string;
  requestTimeoutMs: number;
};

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36';

const flightSchema = z.object({
  departureStationText: z.string(),
  arrivalStationText: z.string(),
  departureDate: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  departure: z.string(),
  departureOffsetText: z.string().default('UTC'),
  arrival: z.string(),
  arrivalOffsetText: z.string().default('UTC'),
  duration: z.string().default(''),
  carrierText: z.string().default(''),
  flightCode: z.string(),
  price: z.union([z.string(), z.number()]).default(''),
  currency: z.string().default(''),
});

const availabilitySchema = z.object({
  flightsOutbound: z.array(flightSchema).nullish(),
});

/** Turns an availability response body into a check result. */
export function parseAvailability(payload: unknown): CheckResult {
  const parsed = availabilitySchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'transient-failure', reason: 'Malformed availability payload' };
  }
  const flights = parsed.data.flightsOutbound ?? [];
  if (flights.length === 0) return { kind: 'none-found' };

  const occurrences: CheckedOccurrence[] = flights.map((f) => ({
    date: f.departureDate.slice(0, 10),
    departure: { city: f.departureStationText, time: f.departure, utcOffset: f.departureOffsetText },
    arrival: { city: f.arrivalStationText, time: f.arrival, utcOffset: f.arrivalOffsetText },
    duration: f.duration,
    carrier: f.carrierText,
    flightCode: f.flightCode,
    price: `${f.price}${f.currency ? ` ${f.currency}` : ''}`,
  }));
  return { kind: 'occurrences', occurrences };
}

/**
 * One persistent browser context per worker. The browser is only used to obtain
 * the session (cookies and the XSRF token); availability itself is fetched as
 * JSON through the context's request API so cookies ride along.
 */
export class BrowserChecker implements AvailabilityChecker {
  private context: BrowserContext | null = null;
  private xsrfToken: string | null = null;

  constructor(
    private readonly options: BrowserCheckerOptions,
    private readonly workerId: number,
    private readonly logger: Logger = new Logger(`checker-${workerId}`),
  ) {}

  private async ensureContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    this.context = await chromium.launchPersistentContext(
      path.join(this.options.userDataDir, `worker-${this.workerId}`),
      {
        headless: !this.options.headful,
        channel: this.options.channel,
        viewport: { width: 1280, height: 900 },
        userAgent: USER_AGENT,
      },
    );
    return this.context;
  }

  async resetSession(): Promise<void> {
    await this.close();
    const ctx = await this.ensureContext();
    if (this.options.loginUrl && this.options.username && this.options.password) {
      await this.signIn(ctx, this.options.loginUrl, this.options.username, this.options.password);
    }

    const page = await ctx.newPage();
    try {
      await page.goto(this.options.entryUrl, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.requestTimeoutMs,
      });
      await page.waitForTimeout(1500);
    } finally {
      await page.close();
    }

    const cookies = await ctx.cookies();
    const xsrf = cookies.find((c) => c.name === 'XSRF-TOKEN');
    this.xsrfToken = xsrf ? decodeURIComponent(xsrf.value) : null;
    this.logger.debug('Session ready', { cookies: cookies.length, xsrf: Boolean(this.xsrfToken) });
  }

  private async signIn(ctx: BrowserContext, loginUrl: string, username: string, password: string): Promise<void> {
    const page = await ctx.newPage();
    try {
      await page.goto(loginUrl, { waitUntil: 'domcontentloaded', timeout: this.options.requestTimeoutMs });
      await page.locator('input[name="username"], input[type="email"], input[id*="user"]').first().fill(username);
      await page.locator('input[type="password"]').first().fill(password);
      await page.locator('button[type="submit"], input[type="submit"]').first().click();
      await page.waitForLoadState('domcontentloaded');
    } finally {
      await page.close();
    }
  }

  async check(leg: Leg, date: string): Promise<CheckResult> {
    if (!this.context) {
      return { kind: 'transient-failure', reason: 'No browser session' };
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/plain, */*',
      Origin: new URL(this.options.entryUrl).origin,
      Referer: this.options.entryUrl,
    };
    if (this.xsrfToken) headers['X-XSRF-TOKEN'] = this.xsrfToken;

    try {
      const resp = await this.context.request.post(this.options.availabilityUrl, {
        headers,
        data: { flightType: 'OW', origin: leg.origin, destination: leg.destination, departure: date, arrival: null },
        timeout: this.options.requestTimeoutMs,
        failOnStatusCode: false,
      });
      const status = resp.status();
      if (status !== 200 && status !== 400) {
        return { kind: 'transient-failure', reason: `HTTP ${status}` };
      }

      let json: unknown;
      try {
        json = await resp.json();
      } catch {
        return { kind: 'transient-failure', reason: 'Invalid JSON from availability endpoint' };
      }
      return parseAvailability(json);
    } catch (e) {
      return { kind: 'transient-failure', reason: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    const ctx = this.context;
    this.context = null;
    this.xsrfToken = null;
    if (ctx) await ctx.close();
  }
}

export function browserCheckerFactory(options: BrowserCheckerOptions, logger = new Logger('checker')): CheckerFactory {
  return (workerId) => new BrowserChecker(options, workerId, logger.child(`worker-${workerId}`));
}
