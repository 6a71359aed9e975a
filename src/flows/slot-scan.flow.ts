import { FlowContext, FlowDefinition, ScanOutcome, SlotResult } from '../types';
import { isOnLoginPage } from '../auth';
import { isSystemBusy } from '../busy';
import { isDateInRange, toIsoDate } from '../dates';
import { NavigationError, SessionExpiredError, isSessionExpired } from '../errors';
import { SELECTORS, TIMEOUTS, dayLinkSelector } from '../selectors';
import { ElementTarget, SiteDriver, target, within } from '../site-driver';
import { requireDriver, requireUser, runFlow } from '../flow-runner';

export interface DateCandidate {
  date: string;
  target: ElementTarget;
}

export interface LocationScan {
  location: string;
  candidates: DateCandidate[];
  slots: SlotResult[];
  busy: boolean;
  /** Set once a slot from this scan has been booked. */
  booked: boolean;
}

function budget(ctx: FlowContext, timeoutMs: number): number {
  return Math.min(timeoutMs, ctx.config.globalTimeout);
}

async function checkBusy(ctx: FlowContext, scan: LocationScan, where: string): Promise<boolean> {
  const busy = await isSystemBusy(requireDriver(ctx), ctx.config.site.busyMarkers, ctx.logger);
  if (busy) {
    ctx.logger.info({ location: scan.location, where }, 'System busy, stopping scan');
    scan.busy = true;
  }
  return busy;
}

async function failIfSignedOut(
  ctx: FlowContext,
  driver: SiteDriver,
  where: string,
  cause?: unknown
): Promise<void> {
  if (await isOnLoginPage(driver, ctx.config, ctx.logger)) {
    throw new SessionExpiredError(`Redirected to sign-in during ${where}.`, { cause });
  }
}

async function openCalendar(ctx: FlowContext, driver: SiteDriver): Promise<boolean> {
  await driver.click(target(SELECTORS.DATE_INPUT), { timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE) });
  return driver.waitFor(SELECTORS.CALENDAR, { timeoutMs: budget(ctx, TIMEOUTS.CALENDAR) });
}

export async function collectDateCandidates(ctx: FlowContext): Promise<DateCandidate[]> {
  const driver = requireDriver(ctx);
  const user = requireUser(ctx);
  const cells = await driver.count(SELECTORS.AVAILABLE_DAY_CELL);
  const candidates: DateCandidate[] = [];

  for (let index = 0; index < cells; index += 1) {
    const cell = target(SELECTORS.AVAILABLE_DAY_CELL, index);
    const link = target(within(cell, 'a'));
    const day = (await driver.textOf(link, TIMEOUTS.READ)).trim();
    const year = await driver.attributeOf(cell, 'data-year', TIMEOUTS.READ);
    const month = await driver.attributeOf(cell, 'data-month', TIMEOUTS.READ);
    const isoDate = year !== null && month !== null ? toIsoDate(year, month, day) : null;

    if (year === null || month === null || isoDate === null) {
      ctx.logger.debug({ day }, 'Calendar cell without a usable date, keeping by position');
      candidates.push({ date: day, target: link });
      continue;
    }

    if (!isDateInRange(isoDate, user.startDate, user.endDate)) {
      ctx.logger.debug({ date: isoDate }, 'Date outside requested range');
      continue;
    }

    candidates.push({ date: isoDate, target: target(dayLinkSelector(year, month, day)) });
  }

  return candidates;
}

export function createSlotScanFlow(scan: LocationScan): FlowDefinition {
  return {
    name: 'slot-scan',
    description: 'Read open dates and time slots for one location',
    steps: [
      {
        name: 'select-location',
        description: 'Choose the facility matching the location.',
        action: async (ctx) => {
          const driver = requireDriver(ctx);
          const options = await driver.texts(SELECTORS.FACILITY_OPTION);
          const index = options.findIndex((text) => text.includes(scan.location));
          if (index < 0) {
            await failIfSignedOut(ctx, driver, 'location selection');
            ctx.logger.warn({ location: scan.location, offered: options }, 'Location not offered, skipping');
            return 'halt';
          }

          const option = target(SELECTORS.FACILITY_OPTION, index);
          const value = await driver.attributeOf(option, 'value', TIMEOUTS.READ);
          await driver.selectOption(
            target(SELECTORS.FACILITY_SELECT),
            value ?? options[index].trim(),
            budget(ctx, TIMEOUTS.CLICKABLE)
          );
          await driver.pause(TIMEOUTS.LOCATION_SETTLE);
          ctx.logger.info({ location: scan.location }, 'Location selected');

          if (await checkBusy(ctx, scan, 'location')) {
            return 'halt';
          }
        },
      },
      {
        name: 'open-date-picker',
        description: 'Open the appointment date calendar.',
        action: async (ctx) => {
          const driver = requireDriver(ctx);
          let opened: boolean;
          try {
            opened = await openCalendar(ctx, driver);
          } catch (error) {
            await failIfSignedOut(ctx, driver, 'date picker', error);
            if (await checkBusy(ctx, scan, 'datepicker')) {
              return 'halt';
            }
            throw error;
          }

          if (await checkBusy(ctx, scan, 'datepicker')) {
            return 'halt';
          }
          if (!opened) {
            await failIfSignedOut(ctx, driver, 'date picker');
            throw new NavigationError('Date picker did not open.');
          }
        },
      },
      {
        name: 'collect-dates',
        description: 'List selectable days inside the requested range.',
        action: async (ctx) => {
          scan.candidates = await collectDateCandidates(ctx);
          ctx.logger.info(
            { location: scan.location, dates: scan.candidates.map((candidate) => candidate.date) },
            'Open dates found'
          );
        },
      },
      {
        name: 'read-time-slots',
        description: 'Open each date and read the offered times.',
        action: async (ctx) => {
          const driver = requireDriver(ctx);
          let mayBook = requireUser(ctx).autoBook;

          for (const candidate of scan.candidates) {
            try {
              const calendarVisible = await driver.waitFor(SELECTORS.CALENDAR, {
                timeoutMs: TIMEOUTS.CALENDAR_VISIBLE_PROBE,
              });
              if (!calendarVisible && !(await openCalendar(ctx, driver))) {
                await failIfSignedOut(ctx, driver, 'date scan');
                ctx.logger.warn({ date: candidate.date }, 'Could not reopen calendar');
                continue;
              }

              await driver.click(candidate.target, { timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE) });
              await driver.pause(TIMEOUTS.DATE_SETTLE);

              if (await checkBusy(ctx, scan, 'date')) {
                return 'halt';
              }

              const timesShown = await driver.waitFor(SELECTORS.TIME_SELECT, {
                timeoutMs: budget(ctx, TIMEOUTS.TIME_SELECT),
              });
              if (!timesShown) {
                await failIfSignedOut(ctx, driver, 'date scan');
                ctx.logger.info({ date: candidate.date }, 'No time selector for date');
                continue;
              }

              const times = (await driver.texts(SELECTORS.TIME_OPTION))
                .slice(1)
                .map((text) => text.trim())
                .filter((text) => text.length > 0);

              const found: SlotResult[] = times.map((time) => ({
                city: scan.location,
                date: candidate.date,
                time,
                autoBooked: false,
              }));
              ctx.logger.info({ location: scan.location, date: candidate.date, times }, 'Time slots read');

              if (mayBook && found.length > 0) {
                mayBook = false;
                found[0].autoBooked = await bookFirstTime(ctx, found[0]);
              }
              scan.slots.push(...found);
              if (found.some((slot) => slot.autoBooked)) {
                scan.booked = true;
                return 'halt';
              }
            } catch (error) {
              if (isSessionExpired(error)) {
                throw error;
              }
              await failIfSignedOut(ctx, driver, 'date scan', error);
              if (await checkBusy(ctx, scan, 'date')) {
                return 'halt';
              }
              ctx.logger.warn({ err: error, date: candidate.date }, 'Error checking date, continuing');
            }
          }
        },
      },
    ],
  };
}

/**
 * Picks the slot's time on the open form and submits it. Returns whether the portal
 * confirmed the booking; session expiry still propagates.
 */
export async function bookFirstTime(ctx: FlowContext, slot: SlotResult): Promise<boolean> {
  const driver = requireDriver(ctx);
  ctx.logger.info({ slot }, 'Booking appointment');

  try {
    const index = (await driver.texts(SELECTORS.TIME_OPTION)).findIndex((text) => text.trim() === slot.time);
    const value =
      index < 0 ? null : await driver.attributeOf(target(SELECTORS.TIME_OPTION, index), 'value', TIMEOUTS.READ);
    await driver.selectOption(target(SELECTORS.TIME_SELECT), value ?? slot.time, budget(ctx, TIMEOUTS.CLICKABLE));
    await driver.click(target(SELECTORS.BOOK_SUBMIT), { timeoutMs: budget(ctx, TIMEOUTS.CLICKABLE) });

    const confirmed = await driver.waitFor(SELECTORS.BOOKING_CONFIRMATION, {
      timeoutMs: budget(ctx, TIMEOUTS.BOOKING_CONFIRMATION),
      state: 'attached',
    });
    if (confirmed) {
      ctx.logger.info({ slot }, 'Appointment booked');
      return true;
    }

    await failIfSignedOut(ctx, driver, 'booking');
    ctx.logger.error({ slot }, 'Booking was not confirmed');
  } catch (error) {
    if (isSessionExpired(error)) {
      throw error;
    }
    await failIfSignedOut(ctx, driver, 'booking', error);
    ctx.logger.error({ err: error, slot }, 'Booking failed');
  }

  await ctx.debug?.('booking_error');
  return false;
}

export function locationsToScan(location: string, preferredCities: string[]): string[] {
  const locations: string[] = [];
  for (const candidate of [location, ...preferredCities]) {
    const trimmed = candidate.trim();
    if (trimmed && !locations.includes(trimmed)) {
      locations.push(trimmed);
    }
  }
  return locations;
}

/**
 * Scans the configured location and then each preferred city. A busy page or a booking
 * ends the scan; slots read before it are kept.
 */
export async function scanSlots(ctx: FlowContext): Promise<ScanOutcome> {
  const user = requireUser(ctx);
  const slots: SlotResult[] = [];

  for (const location of locationsToScan(user.location, user.preferredCities)) {
    const scan: LocationScan = { location, candidates: [], slots: [], busy: false, booked: false };
    await runFlow(createSlotScanFlow(scan), ctx);
    slots.push(...scan.slots);

    if (scan.busy) {
      return { slots, busy: true };
    }
    if (scan.booked) {
      break;
    }
  }

  return { slots, busy: false };
}
