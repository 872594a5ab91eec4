// Store module exports

export * from './catalog';
export * from './clients';
export * from './bookings';
export * from './locks';
