import { round, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { RepairTicket } from '../sources/dto/repair-ticket.dto';

export interface RepairCost {
  repairId: string;
  mainline: string;
  description: string;
  /** Timesheet rows counted against the repair */
  workEntries: number;
  hours: number;
  cost: number;
  /** 0 when no taps were put in during the repair */
  costPerTap: number;
}

/**
 * Labour cost of each repair ticket: hours × rate of every timesheet row on
 * the ticket's mainline dated between the day it was found and the day it was
 * resolved (or `now` while still open). Tickets without a found date or a
 * mainline cost nothing.
 */
export function repairCosts(
  tickets: readonly RepairTicket[],
  personnel: readonly PersonnelRecord[],
  now: Date,
): RepairCost[] {
  return tickets.map((ticket) => {
    const { dateFound } = ticket;
    const base = {
      repairId: ticket.repairId,
      mainline: ticket.mainline,
      description: ticket.description,
    };
    if (!dateFound || !ticket.mainline) {
      return { ...base, workEntries: 0, hours: 0, cost: 0, costPerTap: 0 };
    }

    const end = (ticket.dateResolved ?? now).getTime();
    const matched = personnel.filter(
      (r) =>
        r.mainline === ticket.mainline &&
        r.date.getTime() >= dateFound.getTime() &&
        r.date.getTime() <= end,
    );

    const cost = sum(matched.map((r) => r.hours * r.rate));
    const taps = sum(matched.map((r) => r.tapsPutIn));
    return {
      ...base,
      workEntries: matched.length,
      hours: round(sum(matched.map((r) => r.hours))),
      cost: round(cost),
      costPerTap: taps > 0 ? round(cost / taps) : 0,
    };
  });
}
