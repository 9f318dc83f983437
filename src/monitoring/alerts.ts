import { randomUUID } from 'node:crypto';

import { EventEmitter } from 'eventemitter3';

import { Logger } from '../core/logger.js';
import type { Alert, AlertChannel, AlertInput, FalsifierCheckResult } from './types.js';

export type AlertHandler = (alert: Alert) => void;

export const DEFAULT_MAX_RETAINED_ALERTS = 500;

export interface AlertEvents {
  alert: (alert: Alert) => void;
}

/** Writes alerts to the log at a level matching their severity. */
export function logAlertHandler(logger: Logger): AlertHandler {
  return (alert) => {
    const line = `[alert:${alert.severity}] ${alert.title}: ${alert.message}`;
    if (alert.severity === 'critical') logger.error(line);
    else if (alert.severity === 'warning') logger.warn(line);
    else logger.info(line);
  };
}

/**
 * Creates alerts and hands them to every registered handler. Delivery
 * transport (email, webhook) lives outside this package; `channels` only
 * records where an alert should go.
 */
export class AlertGenerator extends EventEmitter<AlertEvents> {
  private alerts: Alert[] = [];
  private handlers: AlertHandler[] = [];

  constructor(
    private readonly channels: AlertChannel[] = ['log'],
    private readonly logger: Logger = new Logger('info'),
    private readonly maxRetained: number = DEFAULT_MAX_RETAINED_ALERTS
  ) {
    super();
  }

  addHandler(handler: AlertHandler): void {
    this.handlers.push(handler);
  }

  raise(input: AlertInput): Alert {
    const alert: Alert = {
      ...input,
      id: randomUUID(),
      createdAt: new Date().toISOString(),
      details: input.details ?? {},
      channels: [...this.channels],
      delivered: false,
    };
    this.alerts.push(alert);
    if (this.alerts.length > this.maxRetained) {
      this.alerts.splice(0, this.alerts.length - this.maxRetained);
    }
    this.deliver(alert);
    this.emit('alert', alert);
    return alert;
  }

  /** Alert for a triggered falsifier; `undefined` when the check did not trigger. */
  fromCheck(result: FalsifierCheckResult, extra: Record<string, unknown> = {}): Alert | undefined {
    if (!result.triggered) {
      return undefined;
    }
    return this.raise({
      severity: result.triggerAction === 'sunset' ? 'critical' : 'warning',
      source: 'falsifier_checker',
      hypothesisId: result.hypothesisId,
      title: `Falsifier triggered: ${result.metric} for hypothesis '${result.hypothesisId}'`,
      message:
        `Falsifier [${result.falsifierIndex}] triggered: ${result.metric}=${result.metricValue} ` +
        `${result.operator} ${result.threshold} (window=${result.window}). ` +
        `Recommended action: ${result.triggerAction}`,
      recommendedAction: result.triggerAction,
      details: {
        hypothesisId: result.hypothesisId,
        falsifierIndex: result.falsifierIndex,
        metric: result.metric,
        metricValue: result.metricValue,
        operator: result.operator,
        threshold: result.threshold,
        window: result.window,
        recommendedAction: result.triggerAction,
        ...extra,
      },
    });
  }

  /** The most recent alerts, oldest first. */
  list(): Alert[] {
    return [...this.alerts];
  }

  private deliver(alert: Alert): void {
    for (const handler of this.handlers) {
      try {
        handler(alert);
        alert.delivered = true;
      } catch (error) {
        this.logger.warn(`Alert handler failed for alert ${alert.id}`, error);
      }
    }
  }
}
