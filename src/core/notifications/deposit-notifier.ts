import { Logger } from '@nestjs/common';
import { FanOutResult, NotificationEvent } from '../domain/models';
import { ChatTransport } from '../interfaces';
import { CredentialDirectory, maskCredential } from '../credentials';
import { formatDepositNotification } from '../presentation';

/**
 * Relays a deposit notification to every chat enrolled under its credential.
 *
 * Deliveries run concurrently and independently; a failed send is logged
 * and reported in the result, never thrown. notify() settles only after
 * every recipient has been attempted.
 */
export class DepositNotifier {
  private readonly logger = new Logger(DepositNotifier.name);

  constructor(
    private readonly directory: CredentialDirectory,
    private readonly transport: ChatTransport,
  ) {}

  async notify(event: NotificationEvent): Promise<FanOutResult> {
    const recipients = this.directory.identitiesFor(event.merchantCredential);
    const result: FanOutResult = {
      recipients: recipients.length,
      delivered: [],
      failed: [],
    };

    if (recipients.length === 0) {
      this.logger.warn(
        `No chat enrolled for credential ${maskCredential(event.merchantCredential)}; deposit to ${event.address} not relayed`,
      );
      return result;
    }

    const text = formatDepositNotification(event);
    const outcomes = await Promise.allSettled(
      recipients.map((identity) => this.transport.sendMessage(identity, text)),
    );

    outcomes.forEach((outcome, index) => {
      const identity = recipients[index];
      if (outcome.status === 'fulfilled') {
        result.delivered.push(identity);
        return;
      }

      const error =
        outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      result.failed.push({ identity, error });
      this.logger.error(
        `Failed to deliver deposit notification to ${identity}: ${error.message}`,
        error.stack,
      );
    });

    return result;
  }
}
