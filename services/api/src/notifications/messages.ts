import { format, parseISO } from 'date-fns';
import { EntryStatus, type Employee } from '@timecard/shared';
import type { DecisionMade } from '../workflow/events.js';

export type DecisionMessage = {
  subject: string;
  text: string;
};

export function formatWorkDate(workDate: string): string {
  return format(parseISO(workDate), 'EEEE, MMMM d, yyyy');
}

export function buildDecisionMessage(event: DecisionMade, employee: Employee): DecisionMessage {
  const { entry } = event;
  const verdict = event.decision === EntryStatus.APPROVED ? 'approved' : 'rejected';
  const date = formatWorkDate(entry.workDate);

  const lines = [
    `Hi ${employee.name},`,
    '',
    `Your time card entry for ${date} has been ${verdict}.`,
    '',
    `Hours: ${entry.hours.toFixed(2)}`,
  ];
  if (entry.startTime && entry.endTime) {
    lines.push(`Time: ${entry.startTime}-${entry.endTime}`);
  }
  if (entry.project) {
    lines.push(`Project: ${entry.project}`);
  }
  if (event.decision === EntryStatus.REJECTED && entry.comment) {
    lines.push(`Comment: ${entry.comment}`);
  }

  return {
    subject: `Time card entry ${verdict}: ${date}`,
    text: lines.join('\n'),
  };
}
