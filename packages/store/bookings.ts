// Booking ledger
// Single owner of bookings and the only place they are added or removed.

import { randomUUID } from 'crypto';

import {
  ClientNotFoundError,
  DEFAULT_DURATION_BOUNDS,
  DurationBoundsSchema,
  HallNotAvailableError,
  ValidationError,
  bookingRequestSchema,
  buildHallLockKey,
  componentLogger,
  computeCost,
  fail,
  findConflicts,
  findMostExpensiveHall,
  ok,
  parseWith,
  toValidationError,
  type AdmittedBooking,
  type Booking,
  type BookingDateGroup,
  type BookingRequest,
  type ClientIdentity,
  type ConflictPolicy,
  type DurationBounds,
  type EquipmentItem,
  type Hall,
  type Logger,
  type NoHallsError,
  type ParsedBookingRequest,
  type Result,
} from '../core';
import type { Catalog } from './catalog';
import type { ClientRegistry } from './clients';
import { AdmissionLocks } from './locks';

export type AdmissionError = ValidationError | HallNotAvailableError | ClientNotFoundError;

export interface BookingLedgerOptions {
  catalog: Catalog;
  clients: ClientRegistry;
  durationBounds?: DurationBounds;
  conflictPolicy?: ConflictPolicy;
  logger?: Logger;
  locks?: AdmissionLocks;
  generateId?: () => string;
}

export class BookingLedger {
  private bookings: Booking[] = [];
  private readonly catalog: Catalog;
  private readonly clients: ClientRegistry;
  private readonly requestSchema: ReturnType<typeof bookingRequestSchema>;
  private readonly conflictPolicy: ConflictPolicy;
  private readonly log: Logger;
  private readonly locks: AdmissionLocks;
  private readonly generateId: () => string;

  constructor(options: BookingLedgerOptions) {
    const bounds = DurationBoundsSchema.safeParse(options.durationBounds ?? DEFAULT_DURATION_BOUNDS);
    if (!bounds.success) {
      throw toValidationError(bounds.error, 'durationBounds');
    }

    this.catalog = options.catalog;
    this.clients = options.clients;
    this.requestSchema = bookingRequestSchema(bounds.data);
    this.conflictPolicy = options.conflictPolicy ?? 'overlap';
    this.log = options.logger ?? componentLogger('ledger');
    this.locks = options.locks ?? new AdmissionLocks();
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.bookings.length;
  }

  /**
   * Grants the requested slot or explains why not. Everything from the client
   * check to the insert runs under the hall's lock, so two requests for one
   * hall cannot both pass the availability check.
   */
  async admit(request: BookingRequest): Promise<Result<AdmittedBooking, AdmissionError>> {
    const parsed = parseWith(this.requestSchema, request);
    if (!parsed.ok) {
      return this.reject(parsed.error, request);
    }

    const candidate = parsed.value;
    const lockKey = buildHallLockKey(candidate.hallNumber);
    return this.locks.runExclusive(lockKey, () => this.admitLocked(candidate));
  }

  /**
   * Removes every booking whose client currently matches all of first name,
   * last name and phone.
   */
  cancel(identity: ClientIdentity): Result<number, ClientNotFoundError> {
    const matches = (booking: Booking) =>
      booking.client.firstName === identity.firstName.trim() &&
      booking.client.lastName === identity.lastName.trim() &&
      booking.client.phone === identity.phone.trim();

    const kept = this.bookings.filter((booking) => !matches(booking));
    const removed = this.bookings.length - kept.length;
    if (removed === 0) {
      const label = `${identity.firstName} ${identity.lastName} (${identity.phone})`;
      this.log.info({ client: label }, 'cancel_no_match');
      return fail(new ClientNotFoundError(label));
    }

    this.bookings = kept;
    this.log.info(
      { first_name: identity.firstName, removed_count: removed, remaining_count: kept.length },
      'bookings_canceled'
    );
    return ok(removed);
  }

  /**
   * Bookings by ascending date; within a date, in the order they were admitted.
   */
  list(): readonly Booking[] {
    return Object.freeze([...this.bookings].sort((a, b) => compareDates(a.date, b.date)));
  }

  listByDate(): BookingDateGroup[] {
    const groups: BookingDateGroup[] = [];
    for (const booking of this.list()) {
      const last = groups[groups.length - 1];
      if (last && last.date === booking.date) {
        last.bookings.push(booking);
      } else {
        groups.push({ date: booking.date, bookings: [booking] });
      }
    }
    return groups;
  }

  findMostExpensiveHall(halls: readonly Hall[] = this.catalog.listHalls()): Result<Hall, NoHallsError> {
    return findMostExpensiveHall(halls);
  }

  private admitLocked(request: ParsedBookingRequest): Result<AdmittedBooking, AdmissionError> {
    const client = this.clients.get(request.clientId);
    if (!client) {
      return this.reject(new ClientNotFoundError(request.clientId), request);
    }
    if (!this.clients.validatePhone(client)) {
      return this.reject(
        new ValidationError('phone', `Client phone ${client.phone} is not an 11-digit number`),
        request
      );
    }

    const hall = this.catalog.findHall(request.hallNumber);
    if (!hall) {
      return this.reject(
        new ValidationError('hallNumber', `Hall ${request.hallNumber} is not in the catalog`),
        request
      );
    }

    const equipment = this.resolveEquipment(request.equipment);
    if (!equipment.ok) {
      return this.reject(equipment.error, request);
    }

    const conflicts = findConflicts(
      this.bookings,
      { hall, date: request.date, time: request.time, durationHours: request.durationHours },
      this.conflictPolicy
    );
    if (conflicts.length > 0) {
      return this.reject(new HallNotAvailableError(hall.number, request.date, request.time), request, {
        conflicting_booking_ids: conflicts.map((booking) => booking.id),
      });
    }

    const cost = computeCost(hall, equipment.value, request.durationHours, client.discount);
    const booking: Booking = Object.freeze({
      id: this.generateId(),
      client,
      hall,
      equipment: Object.freeze(equipment.value),
      date: request.date,
      time: request.time,
      durationHours: request.durationHours,
      cost,
    });
    this.bookings.push(booking);

    this.log.info(
      {
        booking_id: booking.id,
        hall_number: hall.number,
        date: booking.date,
        time: booking.time,
        duration_hours: booking.durationHours,
        equipment_count: booking.equipment.length,
        cost,
      },
      'booking_admitted'
    );
    return ok({ booking, cost });
  }

  // Duplicate names collapse to their first occurrence.
  private resolveEquipment(names: string[]): Result<EquipmentItem[], ValidationError> {
    const items: EquipmentItem[] = [];
    for (const name of new Set(names)) {
      const item = this.catalog.findEquipment(name);
      if (!item) {
        return fail(new ValidationError('equipment', `Equipment "${name}" is not in the catalog`));
      }
      items.push(item);
    }
    return ok(items);
  }

  private reject<E extends AdmissionError>(
    error: E,
    request: Pick<BookingRequest, 'hallNumber' | 'date' | 'time'>,
    extra: Record<string, unknown> = {}
  ): { ok: false; error: E } {
    this.log.warn(
      {
        code: error.code,
        reason: error.message,
        hall_number: request.hallNumber,
        date: request.date,
        time: request.time,
        ...extra,
      },
      'booking_rejected'
    );
    return fail(error);
  }
}

function compareDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
