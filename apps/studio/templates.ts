// Text renderings for the booking and report screens

import { formatCost } from '../../packages/core';
import type { Booking, Client, EquipmentItem, Hall } from '../../packages/core';

export function formatHall(hall: Hall): string {
  return `Hall ${hall.number}, rate: ${formatCost(hall.rate)}/hour, capacity: ${hall.capacity}`;
}

export function formatEquipment(equipment: readonly EquipmentItem[]): string {
  if (equipment.length === 0) {
    return 'none';
  }
  return equipment.map((item) => `${item.name} (${formatCost(item.rate)}/hour)`).join(', ');
}

export function formatClient(client: Client): string {
  const discount = client.discount > 0 ? `, discount: ${client.discount}%` : '';
  return `${client.firstName} ${client.lastName}, phone: ${client.phone}${discount}`;
}

export function formatBooking(booking: Booking): string {
  return (
    `Booking: ${formatClient(booking.client)}\n` +
    `${formatHall(booking.hall)}\n` +
    `Equipment: ${formatEquipment(booking.equipment)}\n` +
    `Date: ${booking.date}, time: ${booking.time}, duration: ${booking.durationHours} h\n` +
    `Cost: ${formatCost(booking.cost)}`
  );
}

export function formatBookingList(bookings: readonly Booking[]): string {
  if (bookings.length === 0) {
    return 'No active bookings.';
  }
  return bookings.map(formatBooking).join('\n\n');
}
