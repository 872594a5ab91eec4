// Public entry: domain types, pricing and availability, plus the in-memory stores

export * from './packages/core';
export * from './packages/store';
