import { DebugArtifact, SlotResult, UserAppointmentSpec } from './types';
import { formatDateRange } from './dates';

export interface Message {
  subject: string;
  body: string;
}

function header(user: UserAppointmentSpec): string[] {
  return [
    `User: ${user.email}`,
    `Location: ${user.location}`,
    `Date range: ${formatDateRange(user.startDate, user.endDate)}`,
  ];
}

export function availabilityMessage(user: UserAppointmentSpec, slot: SlotResult): Message {
  return {
    subject: slot.autoBooked
      ? `Appointment booked: ${slot.city} on ${slot.date} at ${slot.time}`
      : `Appointment available: ${slot.city} on ${slot.date}`,
    body: [
      ...header(user),
      '',
      `City: ${slot.city}`,
      `Date: ${slot.date}`,
      `Time: ${slot.time}`,
      `Booked automatically: ${slot.autoBooked ? 'yes' : 'no'}`,
    ].join('\n'),
  };
}

export function startupMessage(user: UserAppointmentSpec): Message {
  return {
    subject: 'Appointment monitoring started',
    body: [...header(user), '', 'Monitoring has started.'].join('\n'),
  };
}

export function errorMessage(user: UserAppointmentSpec, context: string): Message {
  return {
    subject: 'Appointment monitoring error',
    body: [...header(user), '', `A check failed during: ${context}.`, 'Monitoring will retry.'].join('\n'),
  };
}

export function fatalMessage(user: UserAppointmentSpec, context: string): Message {
  return {
    subject: 'Appointment monitoring stopped',
    body: [...header(user), '', `Monitoring could not continue: ${context}.`].join('\n'),
  };
}

export function debugMessage(user: UserAppointmentSpec, artifact: DebugArtifact): Message {
  const lines = [
    ...header(user),
    '',
    `Capture: ${artifact.prefix}`,
    `Time: ${artifact.timestamp}`,
    `Page: ${artifact.url}`,
  ];
  if (artifact.screenshotPath) {
    lines.push(`Screenshot: ${artifact.screenshotPath}`);
  }
  if (artifact.pageSourcePath) {
    lines.push(`Page source: ${artifact.pageSourcePath}`);
  }

  return { subject: `Debug capture: ${artifact.prefix}`, body: lines.join('\n') };
}
