/**
 * SMS Routes (Twilio inbound webhook)
 *
 * POST /sms/inbound receives form-encoded Twilio message webhooks and answers
 * with TwiML. The conversation reply is always 200 so Twilio never retries a
 * message the state machine already processed.
 */

import type { Express, Request, Response } from "express";
import twilio from "twilio";
import type { AppContext } from "../app/context";
import type { InboundMedia, InboundMessage } from "../services/conversation/conversationService";
import { messages } from "../services/conversation/messages";
import { normalizePhone } from "../utils/phone";

const MAX_MEDIA = 10;

const toStringRecord = (body: unknown): Record<string, string> => {
  const record: Record<string, string> = {};
  if (typeof body !== "object" || body === null) return record;
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === "string") record[key] = value;
  }
  return record;
};

/** Twilio webhook params -> InboundMessage; null when there is no usable sender. */
export function parseTwilioWebhook(params: Record<string, string>): InboundMessage | null {
  const from = normalizePhone(params.From ?? "");
  if (!from) return null;

  const declared = Number.parseInt(params.NumMedia ?? "0", 10);
  const count = Number.isFinite(declared) ? Math.min(Math.max(declared, 0), MAX_MEDIA) : 0;

  const media: InboundMedia[] = [];
  for (let i = 0; i < count; i++) {
    const url = params[`MediaUrl${i}`];
    if (!url) continue;
    const contentType = params[`MediaContentType${i}`];
    media.push(contentType ? { url, contentType } : { url });
  }

  return { from, body: params.Body ?? "", media };
}

export const twimlMessage = (text: string): string => {
  const response = new twilio.twiml.MessagingResponse();
  response.message(text);
  return response.toString();
};

export function registerSmsRoutes(app: Express, ctx: AppContext): void {
  const { logger, conversationService, config } = ctx;

  const signatureValid = (req: Request, params: Record<string, string>): boolean => {
    const authToken = config.twilio.authToken;
    const signature = req.header("X-Twilio-Signature");
    if (!authToken || !signature) return false;

    const baseUrl = config.twilio.publicBaseUrl ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;
    const url = `${baseUrl.replace(/\/$/, "")}${req.originalUrl}`;
    return twilio.validateRequest(authToken, signature, url, params);
  };

  app.post("/sms/inbound", async (req: Request, res: Response) => {
    const params = toStringRecord(req.body);

    if (config.twilio.validateSignature && !signatureValid(req, params)) {
      logger.warn({ path: req.originalUrl }, "sms.invalid_signature");
      return res.status(403).type("text/plain").send("Invalid signature");
    }

    const message = parseTwilioWebhook(params);
    if (!message) {
      logger.warn({ messageSid: params.MessageSid }, "sms.missing_sender");
      return res.status(200).type("text/xml").send(new twilio.twiml.MessagingResponse().toString());
    }

    try {
      const reply = await conversationService.handleMessage(message);
      return res.status(200).type("text/xml").send(twimlMessage(reply.text));
    } catch (err) {
      logger.error({ err, from: message.from }, "sms.inbound_failed");
      return res.status(200).type("text/xml").send(twimlMessage(messages.errorGeneral()));
    }
  });
}
