import axios from 'axios';
import { Writable } from 'node:stream';

type AlertLevel = 'warn' | 'error';

interface LogRecord {
  level?: string | number;
  time?: number;
  msg?: string;
  idempotencyKey?: string;
  eventType?: string;
  organizationId?: number | null;
  error?: string;
  stack?: string;
}

interface SlackField {
  type: 'mrkdwn';
  text: string;
}

const LEVEL_VALUES: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Forwards warn+ pino records to a Slack incoming webhook.
 *
 * Messages are capped per minute so a burst of rejected webhooks cannot flood
 * the channel; records over the cap are dropped.
 */
export class SlackTransport extends Writable {
  private readonly MAX_MESSAGES_PER_MINUTE = 15;
  private messagesInMinute = 0;
  private minuteStart = Date.now();

  constructor(
    private readonly webhookUrl: string,
    private readonly minLevel: AlertLevel = 'error',
  ) {
    super();
  }

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const record = this.parse(chunk.toString());
    if (record && this.levelOf(record) >= LEVEL_VALUES[this.minLevel]) {
      void this.send(record);
    }
    callback();
  }

  levelOf(record: LogRecord): number {
    if (typeof record.level === 'number') return record.level;
    return LEVEL_VALUES[record.level ?? 'info'] ?? 30;
  }

  buildMessage(record: LogRecord) {
    const level = this.levelOf(record);
    const fields: SlackField[] = [
      { type: 'mrkdwn', text: `*Message:*\n${record.msg ?? 'No message'}` },
      {
        type: 'mrkdwn',
        text: `*Time:*\n${new Date(record.time ?? Date.now()).toISOString()}`,
      },
    ];

    if (record.idempotencyKey) {
      fields.push({
        type: 'mrkdwn',
        text: `*Idempotency key:*\n\`${record.idempotencyKey}\``,
      });
    }
    if (record.eventType) {
      fields.push({ type: 'mrkdwn', text: `*Event:*\n${record.eventType}` });
    }
    if (record.organizationId !== undefined && record.organizationId !== null) {
      fields.push({
        type: 'mrkdwn',
        text: `*Organization:*\n${record.organizationId}`,
      });
    }
    if (record.error) {
      fields.push({ type: 'mrkdwn', text: `*Error:*\n${record.error}` });
    }

    return {
      attachments: [
        {
          color: level >= 50 ? '#dc3545' : '#ffc107',
          blocks: [
            {
              type: 'header',
              text: {
                type: 'plain_text',
                text: `${level >= 50 ? '🔴' : '⚠️'} ${this.labelOf(level)}`,
                emoji: true,
              },
            },
            { type: 'section', fields },
          ],
        },
      ],
    };
  }

  private async send(record: LogRecord): Promise<void> {
    const now = Date.now();
    if (now - this.minuteStart > 60000) {
      this.messagesInMinute = 0;
      this.minuteStart = now;
    }
    if (this.messagesInMinute >= this.MAX_MESSAGES_PER_MINUTE) return;
    this.messagesInMinute++;

    try {
      await axios.post(this.webhookUrl, this.buildMessage(record));
    } catch (error: unknown) {
      // Logging through pino here would loop back into this transport.
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Slack alert delivery failed: ${message}\n`);
    }
  }

  private parse(line: string): LogRecord | null {
    try {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null ? parsed : null;
    } catch {
      return null;
    }
  }

  private labelOf(level: number): string {
    const entry = Object.entries(LEVEL_VALUES).find(([, value]) => value === level);
    return (entry?.[0] ?? 'warn').toUpperCase();
  }
}
