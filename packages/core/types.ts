// Shared types for the catalog, client registry and booking ledger

// Catalog entries
export interface Hall {
  readonly number: number;
  readonly rate: number; // per hour
  readonly capacity: number;
}

export interface EquipmentItem {
  readonly name: string;
  readonly rate: number; // per hour
}

// Clients
export interface Client {
  readonly id: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string;
  readonly discount: number; // percent, 0-30
}

export interface ClientIdentity {
  firstName: string;
  lastName: string;
  phone: string;
}

// Bookings
export interface Booking {
  readonly id: string;
  readonly client: Client;
  readonly hall: Hall;
  readonly equipment: readonly EquipmentItem[];
  readonly date: string; // YYYY-MM-DD
  readonly time: string; // HH:mm
  readonly durationHours: number;
  readonly cost: number;
}

export interface BookingRequest {
  clientId: string;
  hallNumber: number;
  equipment: string[];
  date: string; // YYYY-MM-DD or DD.MM.YYYY
  time: string; // H:mm or HH:mm
  durationHours: number;
}

export interface AdmittedBooking {
  booking: Booking;
  cost: number;
}

export interface BookingDateGroup {
  date: string;
  bookings: Booking[];
}

export interface DurationBounds {
  min: number;
  max: number;
}

export type ConflictPolicy = 'overlap' | 'exact';
