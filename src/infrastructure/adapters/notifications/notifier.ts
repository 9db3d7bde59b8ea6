// Notifier - operator notifications by mail(1) and JSON webhook

import * as os from 'os';
import axios from 'axios';
import { NotifierPort } from '../../../domain/ports/notifier';
import { CommandExecutorPort } from '../../../domain/ports/commandExecutor';
import { LoggerPort } from '../../../domain/ports/logger';
import { Notification } from '../../../domain/types/types';
import { LoggerAdapter } from '../logging/loggerAdapter';

const WEBHOOK_TIMEOUT_MS = 10000;

export interface WebhookClient {
  post(url: string, data: unknown, config?: { timeout?: number; headers?: Record<string, string> }): Promise<unknown>;
}

export interface NotifierOptions {
  email: string | null;
  webhookUrl: string | null;
  hostname?: string;
  now?: () => Date;
  http?: WebhookClient;
}

export class MailWebhookNotifier implements NotifierPort {
  private readonly hostname: string;
  private readonly now: () => Date;
  private readonly http: WebhookClient;

  constructor(
    private readonly executor: CommandExecutorPort,
    private readonly options: NotifierOptions,
    private readonly logger: LoggerPort = new LoggerAdapter()
  ) {
    this.hostname = options.hostname ?? os.hostname();
    this.now = options.now ?? (() => new Date());
    this.http = options.http ?? axios;
  }

  async notify(notification: Notification): Promise<void> {
    await this.sendMail(notification);
    await this.sendWebhook(notification);
  }

  private async sendMail(notification: Notification): Promise<void> {
    const { email } = this.options;
    if (!email) return;

    if (!(await this.executor.commandExists('mail'))) {
      this.logger.log('Notifier', 'mail command not found, skipping email notification');
      return;
    }

    const result = await this.executor.run('mail', ['-s', notification.subject, email], {
      input: notification.message + '\n',
    });
    if (result.passed) {
      this.logger.log('Notifier', `Email notification sent to ${email}`);
    } else {
      this.logger.logError('Notifier', `Email notification to ${email} failed`, result.stderr);
    }
  }

  private async sendWebhook(notification: Notification): Promise<void> {
    const { webhookUrl } = this.options;
    if (!webhookUrl) return;

    const payload = {
      status: notification.status,
      message: notification.summary ?? notification.message,
      hostname: this.hostname,
      timestamp: this.now().toISOString(),
      ...notification.fields,
    };

    try {
      await this.http.post(webhookUrl, payload, {
        timeout: WEBHOOK_TIMEOUT_MS,
        headers: { 'Content-Type': 'application/json' },
      });
      this.logger.log('Notifier', 'Webhook notification sent');
    } catch (error) {
      this.logger.logError('Notifier', `Webhook notification to ${webhookUrl} failed`, error);
    }
  }
}
