import { deliveryFailed, err, ok } from '../errors/workflowErrors.js';
import type { EmployeeDirectory } from '../entries/repository.js';
import type { AppLogger } from '../logger.js';
import type { DecisionListener, DecisionMade, NotifyResult } from '../workflow/events.js';
import { buildDecisionMessage } from './messages.js';
import type { EmailTransport } from './transport.js';

export interface NotifierOptions {
  employees: EmployeeDirectory;
  transport: EmailTransport;
  from: string;
  logger: AppLogger;
}

/**
 * Emails the employee about a decision. Best effort: every failure is logged and
 * returned as `DeliveryFailed`, never thrown.
 */
export class Notifier implements DecisionListener {
  constructor(private readonly options: NotifierOptions) {}

  async notify(event: DecisionMade): Promise<NotifyResult> {
    const { entry } = event;
    try {
      const employee = await this.options.employees.findById(entry.employeeId);
      if (!employee) {
        return this.failed(event, `No active employee ${entry.employeeId}`);
      }

      const message = buildDecisionMessage(event, employee);
      await this.options.transport.send({
        from: this.options.from,
        to: employee.email,
        subject: message.subject,
        text: message.text,
      });

      this.options.logger.info(
        { entryId: entry.id, decision: event.decision, transport: this.options.transport.name },
        'Decision notification sent'
      );
      return ok(undefined);
    } catch (error) {
      return this.failed(event, error instanceof Error ? error.message : String(error));
    }
  }

  private failed(event: DecisionMade, reason: string): NotifyResult {
    this.options.logger.warn(
      { entryId: event.entry.id, decision: event.decision, reason },
      'Decision notification failed'
    );
    return err(deliveryFailed(reason));
  }
}
