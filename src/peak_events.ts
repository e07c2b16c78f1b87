// src/peak_events.ts
import fs from 'node:fs';
import axios, { type AxiosInstance } from 'axios';
import { addHours, compareAsc, isSameDay, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import type { MockPeakEvent, Settings } from './config.js';
import { formatIssues, PeakEventError } from './errors.js';
import { logger } from './logger.js';

const IsoDate = z.string().transform((s, ctx) => {
  const d = parseISO(s);
  if (!isValid(d)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${s}"` });
    return z.NEVER;
  }
  return d;
});

export const PeakEventSchema = z.object({
  offre: z.string().nullish(),
  plagehoraire: z.string().nullish(),
  duree: z.string().nullish(),
  secteurclient: z.string().nullish(),
  datedebut: IsoDate,
  datefin: IsoDate,
});

export type PeakEvent = z.infer<typeof PeakEventSchema>;

export interface PeakEventSource {
  readonly name: string;
  getPeakEvents(): Promise<PeakEvent[]>;
}

function parseEvents(source: string, data: unknown): PeakEvent[] {
  const parsed = z.array(PeakEventSchema).safeParse(data);
  if (!parsed.success) throw new PeakEventError(`${source}: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

/** JSON array of events on disk, used to rehearse an event without the API */
export class FilePeakEventSource implements PeakEventSource {
  readonly name = 'file';
  constructor(private readonly file: string) {}

  async getPeakEvents(): Promise<PeakEvent[]> {
    const raw = await fs.promises.readFile(this.file, 'utf8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      throw new PeakEventError(`${this.file}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
    }
    return parseEvents(this.file, data);
  }
}

export class HemsApiPeakEventSource implements PeakEventSource {
  readonly name = 'hems-api';
  constructor(private readonly baseUrl: string, private readonly http: AxiosInstance = axios.create({ timeout: 10_000 })) {}

  async getPeakEvents(): Promise<PeakEvent[]> {
    const { data } = await this.http.get<unknown>(`${this.baseUrl}/peak-events`);
    return parseEvents('HEMS API /peak-events', data);
  }
}

const HqResponseSchema = z.object({
  total_count: z.number().int(),
  results: z.array(z.unknown()),
});

/** Hydro-Québec open data "evenements-pointe" records (CPC-D offer) */
export class HydroQuebecPeakEventSource implements PeakEventSource {
  readonly name = 'hydroquebec';

  constructor(
    private readonly url: string,
    private readonly opts: { attempts: number; delayMs: number } = { attempts: 5, delayMs: 1000 },
    private readonly http: AxiosInstance = axios.create({ timeout: 10_000 }),
  ) {}

  async getPeakEvents(): Promise<PeakEvent[]> {
    const params = {
      select: 'datedebut,datefin,plagehoraire',
      where: 'offre="CPC-D"',
      order_by: 'datedebut DESC',
      limit: 20,
    };

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.opts.attempts; attempt++) {
      try {
        const { data } = await this.http.get<unknown>(this.url, { params });
        const body = HqResponseSchema.safeParse(data);
        if (!body.success) throw new PeakEventError(`Hydro-Québec response: ${formatIssues(body.error)}`);
        logger.debug(`Retrieved ${body.data.total_count} peak events from Hydro-Québec`);
        return parseEvents('Hydro-Québec records', body.data.results);
      } catch (e) {
        lastError = e;
        logger.error(`Peak events request failed (attempt ${attempt}/${this.opts.attempts})`, e);
        if (attempt < this.opts.attempts) await new Promise(r => setTimeout(r, this.opts.delayMs));
      }
    }
    throw new PeakEventError(`Hydro-Québec peak events unavailable: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
  }
}

/** Events from the add-on `gdp_events` option. Only produced on the configured date. */
export class MockPeakEventSource implements PeakEventSource {
  readonly name = 'options';
  constructor(private readonly mock: MockPeakEvent, private readonly now: () => Date = () => new Date()) {}

  async getPeakEvents(): Promise<PeakEvent[]> {
    return mockPeakEvents(this.mock, this.now());
  }
}

const MONTREAL = 'America/Montreal';

/**
 * Expands a mock spec: `AM` 11:00–14:00 UTC, `PM` 21:00–01:00 UTC (next day),
 * `AM/PM` both, `<h>H` three hours from h o'clock Montreal time, `HH:MM`
 * three hours from that UTC time.
 */
export function mockPeakEvents(mock: MockPeakEvent, now: Date): PeakEvent[] {
  const [y, m, d] = mock.date.split('-').map(Number);
  if (y === undefined || m === undefined || d === undefined) return [];

  const localToday = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  if (!isSameDay(new Date(y, m - 1, d), localToday)) {
    logger.debug('Mock peak event date does not match today');
    return [];
  }

  const utc = (h: number, min = 0, dayOffset = 0) => new Date(Date.UTC(y, m - 1, d + dayOffset, h, min));
  const spec = mock.time_spec.trim().toUpperCase();
  const events: PeakEvent[] = [];
  const make = (start: Date, end: Date, plage: string | null): PeakEvent => ({
    offre: 'MOCK',
    plagehoraire: plage,
    duree: null,
    secteurclient: null,
    datedebut: start,
    datefin: end,
  });

  if (spec === 'AM' || spec === 'AM/PM') events.push(make(utc(11), utc(14), 'AM'));
  if (spec === 'PM' || spec === 'AM/PM') events.push(make(utc(21), utc(1, 0, 1), 'PM'));

  const hourMatch = /^(\d{1,2})H$/.exec(spec);
  if (hourMatch) {
    const start = zonedToUtc(y, m, d, Number(hourMatch[1]), 0, MONTREAL);
    events.push(make(start, addHours(start, 3), null));
  }

  const hmMatch = /^(\d{1,2}):(\d{2})$/.exec(spec);
  if (hmMatch) {
    const start = utc(Number(hmMatch[1]), Number(hmMatch[2]));
    events.push(make(start, addHours(start, 3), null));
  }

  if (!events.length) logger.warn(`Unrecognised mock peak event time_spec "${mock.time_spec}"`);
  return events;
}

/** Wall-clock time in `timeZone` to the matching instant */
export function zonedToUtc(y: number, m: number, d: number, h: number, min: number, timeZone: string): Date {
  const guess = Date.UTC(y, m - 1, d, h, min);
  const first = guess - tzOffsetMs(new Date(guess), timeZone);
  // second pass for the hours around a DST switch
  return new Date(guess - tzOffsetMs(new Date(first), timeZone));
}

function tzOffsetMs(at: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric', month: '2-digit', day: '2-digit',
    hour: '2-digit', minute: '2-digit', second: '2-digit',
  }).formatToParts(at);
  const get = (t: string) => Number(parts.find(p => p.type === t)?.value ?? 0);
  const asUtc = Date.UTC(get('year'), get('month') - 1, get('day'), get('hour'), get('minute'), get('second'));
  return asUtc - (at.getTime() - at.getMilliseconds());
}

/**
 * First event of today (by start) that is ongoing or still to come, else null.
 */
export function currentPeakEvent(events: PeakEvent[], now: Date): PeakEvent | null {
  const today = events
    .filter(e => isSameDay(e.datedebut, now))
    .sort((a, b) => compareAsc(a.datedebut, b.datedebut));

  if (!today.length) {
    logger.debug('No peak events found for today');
    return null;
  }
  for (const e of today) {
    if (e.datedebut <= now && now <= e.datefin) {
      logger.debug(`Current peak event: ${e.datedebut.toISOString()} → ${e.datefin.toISOString()}`);
      return e;
    }
    if (now < e.datedebut) {
      logger.debug(`Next peak event: ${e.datedebut.toISOString()} → ${e.datefin.toISOString()}`);
      return e;
    }
  }
  logger.debug('All peak events for today are finished');
  return null;
}

/** Options mock first, then the local file, then the configured remote API */
export function selectPeakEventSource(settings: Settings, fileExists: (p: string) => boolean = fs.existsSync): PeakEventSource {
  if (settings.mockPeakEvent) {
    logger.debug('Using mock peak events from add-on options');
    return new MockPeakEventSource(settings.mockPeakEvent);
  }
  if (fileExists(settings.mockPeakEventsPath)) {
    logger.debug(`Using peak events from local file: ${settings.mockPeakEventsPath}`);
    return new FilePeakEventSource(settings.mockPeakEventsPath);
  }
  if (settings.peakEventsSource === 'hydroquebec') {
    logger.debug('Using peak events from Hydro-Québec open data');
    return new HydroQuebecPeakEventSource(settings.hqApiUrl);
  }
  logger.debug(`Using peak events from HEMS API ${settings.hemsApiBaseUrl}`);
  return new HemsApiPeakEventSource(settings.hemsApiBaseUrl);
}

/** Relevant event for `now`; source failures degrade to "no event" */
export async function retrievePeakEvent(source: PeakEventSource, now: Date): Promise<PeakEvent | null> {
  try {
    const events = await source.getPeakEvents();
    logger.debug(`Retrieved ${events.length} peak events from ${source.name}`);
    return currentPeakEvent(events, now);
  } catch (e) {
    logger.warn(`Peak events unavailable from ${source.name}, using regular schedules: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/** Picks the source again on every call, so a dropped-in events file applies on the next cycle */
export class AutoPeakEventSource implements PeakEventSource {
  private current: PeakEventSource | null = null;

  constructor(private readonly settings: Settings) {}

  get name(): string {
    return this.current?.name ?? 'auto';
  }

  getPeakEvents(): Promise<PeakEvent[]> {
    this.current = selectPeakEventSource(this.settings);
    return this.current.getPeakEvents();
  }
}
