import { Bot } from 'grammy'
import nodemailer from 'nodemailer'
import { alertSubject, buildAlertMessage } from '../core/message.js'
import type { ConditionRange, Location } from '../core/types.js'

const DELIVERY_TIMEOUT_MS = 10_000

export type Channel = 'email' | 'telegram'

export interface Notifier {
  channel: Channel
  send: (ranges: ConditionRange[], location: Location) => Promise<void>
}

export type DeliveryResult =
  | { channel: Channel; ok: true }
  | { channel: Channel; ok: false; error: string }

export interface OutgoingMail {
  from: string
  to: string
  subject: string
  text: string
}

export interface EmailSettings {
  host: string
  port: number
  user: string
  pass: string
  from: string
  to: string[]
  referenceLink?: string
}

export interface TelegramSettings {
  token: string
  chatId: string
}

export function createEmailNotifier(
  settings: EmailSettings,
  sendMail?: (mail: OutgoingMail) => Promise<unknown>,
): Notifier {
  const deliver =
    sendMail ??
    ((mail: OutgoingMail) => {
      const transporter = nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.port === 465,
        auth: { user: settings.user, pass: settings.pass },
        connectionTimeout: DELIVERY_TIMEOUT_MS,
        greetingTimeout: DELIVERY_TIMEOUT_MS,
        socketTimeout: DELIVERY_TIMEOUT_MS,
      })
      return transporter.sendMail(mail)
    })

  return {
    channel: 'email',
    send: async (ranges, location) => {
      await deliver({
        from: settings.from,
        to: settings.to.join(', '),
        subject: alertSubject(location),
        text: buildAlertMessage(ranges, location, {
          referenceLink: settings.referenceLink,
        }),
      })
    },
  }
}

export function createTelegramNotifier(
  settings: TelegramSettings,
  sendMessage?: (chatId: string, text: string) => Promise<unknown>,
): Notifier {
  const deliver =
    sendMessage ??
    ((chatId: string, text: string) => {
      const bot = new Bot(settings.token, {
        client: { timeoutSeconds: DELIVERY_TIMEOUT_MS / 1000 },
      })
      return bot.api.sendMessage(chatId, text)
    })

  return {
    channel: 'telegram',
    send: async (ranges, location) => {
      await deliver(settings.chatId, buildAlertMessage(ranges, location))
    },
  }
}

/**
 * Sends to every channel in order. A failing channel is reported in its
 * result and does not stop the others.
 */
export async function notifyAll(
  notifiers: Notifier[],
  ranges: ConditionRange[],
  location: Location,
): Promise<DeliveryResult[]> {
  if (!ranges.length) return []

  const results: DeliveryResult[] = []
  for (const notifier of notifiers) {
    try {
      await notifier.send(ranges, location)
      console.log(
        `notify_sent channel=${notifier.channel} location="${location.name}" ranges=${ranges.length}`,
      )
      results.push({ channel: notifier.channel, ok: true })
    } catch (err) {
      console.error(
        `notify_failed channel=${notifier.channel} location="${location.name}"`,
        err,
      )
      results.push({ channel: notifier.channel, ok: false, error: String(err) })
    }
  }
  return results
}
