// src/modules/recovery/delivery.ts
// ============================================================================
// Versand-Task für die Recovery-Mail (läuft im Worker-Pool)
// ----------------------------------------------------------------------------
// Genau ein sendMail(); Erfolg und Fehler sind endgültig. Kein Retry, kein
// Weiterreichen an den Aufrufer. Der Transporter wird danach geschlossen.
// ============================================================================

import type { BackgroundTask } from "../../libs/executor.js";
import type { Logger } from "../../libs/logger.js";
import type { MailSession } from "../../libs/mail.js";
import { recordMailDelivery } from "../../libs/metrics.js";
import { hashEmailForLog } from "../../libs/pii.js";
import { DeliveryError } from "./errors.js";
import type { ComposedMail, MailAddress } from "./types.js";

function toNodemailerAddress(value: MailAddress): string | { name: string; address: string } {
  return value.name ? { name: value.name, address: value.address } : value.address;
}

export function createMailDeliveryTask(
  session: MailSession,
  message: ComposedMail,
  log: Logger,
): BackgroundTask {
  // eigene Kopie: der Request-Kontext kann danach weiterlaufen
  const mail: ComposedMail = {
    ...message,
    from: { ...message.from },
    to: { ...message.to },
    date: new Date(message.date.getTime()),
  };
  const recipientHash = hashEmailForLog(mail.to.address);

  return {
    name: "mail_delivery",
    async run() {
      try {
        const info = await session.transporter.sendMail({
          from: toNodemailerAddress(mail.from),
          to: toNodemailerAddress(mail.to),
          subject: mail.subject,
          html: mail.html,
          text: mail.text,
          date: mail.date,
        });
        recordMailDelivery(true);
        log.info(
          { recipient: recipientHash, messageId: info.messageId, host: session.host },
          "mail_delivery_succeeded",
        );
      } catch (cause) {
        const err = new DeliveryError(undefined, { cause });
        recordMailDelivery(false);
        log.error({ err, recipient: recipientHash, host: session.host }, "mail_delivery_failed");
      } finally {
        session.transporter.close();
      }
    },
  };
}
