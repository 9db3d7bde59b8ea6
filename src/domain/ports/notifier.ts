// Port: Notifier
// Outbound operator notifications (mail, webhook)

import { Notification } from '../types/types';

export interface NotifierPort {
  /**
   * Deliver to every configured channel. Delivery failures are logged, not thrown.
   */
  notify(notification: Notification): Promise<void>;
}
