// Client registry

import { randomUUID } from 'crypto';

import {
  ClientNotFoundError,
  DiscountSchema,
  NewClientSchema,
  PhoneSchema,
  fail,
  ok,
  parseWith,
  type Client,
  type Result,
  type ValidationError,
} from '../core';

type ClientRecord = { -readonly [K in keyof Client]: Client[K] };

export interface ClientRegistryOptions {
  generateId?: () => string;
}

/**
 * Owns client records. Bookings hold references to the same objects, so a
 * phone or discount change is visible through every booking of that client.
 */
export class ClientRegistry {
  private clients = new Map<string, ClientRecord>();
  private readonly generateId: () => string;

  constructor(options: ClientRegistryOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Phone format is not checked here: a client may be on file with a phone
   * that later fails `validatePhone`, which blocks admission instead.
   */
  addClient(
    firstName: string,
    lastName: string,
    phone: string,
    discount: number
  ): Result<Client, ValidationError> {
    const parsed = parseWith(NewClientSchema, { firstName, lastName, phone, discount });
    if (!parsed.ok) {
      return parsed;
    }

    const record: ClientRecord = { id: this.generateId(), ...parsed.value };
    this.clients.set(record.id, record);
    return ok(record);
  }

  updatePhone(
    client: Client,
    newPhone: string
  ): Result<Client, ValidationError | ClientNotFoundError> {
    const record = this.clients.get(client.id);
    if (!record) {
      return fail(new ClientNotFoundError(client.id));
    }

    const parsed = parseWith(PhoneSchema, newPhone, 'phone');
    if (!parsed.ok) {
      return parsed;
    }

    record.phone = parsed.value;
    return ok(record);
  }

  applyDiscount(
    client: Client,
    amount: number
  ): Result<Client, ValidationError | ClientNotFoundError> {
    const record = this.clients.get(client.id);
    if (!record) {
      return fail(new ClientNotFoundError(client.id));
    }

    const parsed = parseWith(DiscountSchema, amount, 'discount');
    if (!parsed.ok) {
      return parsed;
    }

    record.discount = parsed.value;
    return ok(record);
  }

  validatePhone(client: Client): boolean {
    return isValidPhone(client.phone);
  }

  get(clientId: string): Client | null {
    return this.clients.get(clientId) ?? null;
  }

  list(): readonly Client[] {
    return Object.freeze([...this.clients.values()].map((record) => Object.freeze({ ...record })));
  }
}

export function isValidPhone(phone: string): boolean {
  return PhoneSchema.safeParse(phone).success;
}
