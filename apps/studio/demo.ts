// Example studio session: set up the catalog, book, report, cancel

import { componentLogger, formatCost } from '../../packages/core';
import type { Logger, Result, StudioError } from '../../packages/core';
import { BookingLedger, Catalog, ClientRegistry } from '../../packages/store';
import type { StudioConfig } from './config';
import { summarizeBookings } from './report';
import { formatBookingList, formatHall } from './templates';

export interface DemoOptions {
  print?: (text: string) => void;
  logger?: Logger;
}

export interface DemoSummary {
  admitted_count: number;
  rejected_count: number;
  total_cost: number;
  most_expensive_hall: number;
  canceled_count: number;
  remaining_count: number;
}

const LIGHTING = 'Professional lighting';
const BACKDROP = 'White backdrop';
const PROPS = 'Chair and flowers';

export async function runStudioDemo(
  config: Pick<StudioConfig, 'durationBounds' | 'conflictPolicy'>,
  options: DemoOptions = {}
): Promise<DemoSummary> {
  const print = options.print ?? ((text: string) => console.log(text));
  const log = options.logger ?? componentLogger('demo');

  const catalog = new Catalog();
  unwrap(catalog.registerHall({ number: 1, rate: 2000, capacity: 10 }));
  unwrap(catalog.registerHall({ number: 2, rate: 3500, capacity: 25 }));
  unwrap(catalog.registerEquipment({ name: LIGHTING, rate: 500 }));
  unwrap(catalog.registerEquipment({ name: BACKDROP, rate: 200 }));
  unwrap(catalog.registerEquipment({ name: PROPS, rate: 150 }));

  const clients = new ClientRegistry();
  const anna = unwrap(clients.addClient('Anna', 'Ivanova', '89001234567', 0));

  const ledger = new BookingLedger({
    catalog,
    clients,
    durationBounds: config.durationBounds,
    conflictPolicy: config.conflictPolicy,
    logger: log,
  });

  const attempts = await Promise.all([
    ledger.admit({
      clientId: anna.id,
      hallNumber: 1,
      equipment: [LIGHTING, BACKDROP],
      date: '10.02.2025',
      time: '15:00',
      durationHours: 2,
    }),
    ledger.admit({
      clientId: anna.id,
      hallNumber: 1,
      equipment: [],
      date: '2025-02-10',
      time: '16:00',
      durationHours: 1,
    }),
  ]);

  let admitted = 0;
  for (const attempt of attempts) {
    if (attempt.ok) {
      admitted += 1;
      print(`Booking added, cost ${formatCost(attempt.value.cost)}`);
    } else {
      print(`Booking refused: ${attempt.error.message}`);
    }
  }

  print(formatBookingList(ledger.list()));

  const report = summarizeBookings(ledger.list());
  print(`Bookings: ${report.bookingCount}, revenue: ${formatCost(report.totalCost)}`);

  const priciest = unwrap(ledger.findMostExpensiveHall());
  print(`Most expensive hall: ${formatHall(priciest)}`);

  const canceled = ledger.cancel({
    firstName: anna.firstName,
    lastName: anna.lastName,
    phone: anna.phone,
  });
  print(`Bookings of ${anna.firstName} removed.`);
  print(formatBookingList(ledger.list()));

  const summary: DemoSummary = {
    admitted_count: admitted,
    rejected_count: attempts.length - admitted,
    total_cost: report.totalCost,
    most_expensive_hall: priciest.number,
    canceled_count: canceled.ok ? canceled.value : 0,
    remaining_count: ledger.size,
  };

  log.info(summary, 'studio_demo_summary');
  return summary;
}

function unwrap<T>(result: Result<T, StudioError>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
