import { FakeClock } from "@renderscreenshot/clock"
import { ApiError } from "../../errors/api-error"
import { constructWebhookEvent } from "../construct"
import { computeWebhookSignature } from "../verify"

const TS = "1700000000"
const PAYLOAD = JSON.stringify({ type: "screenshot.completed", id: "evt_1", data: { ok: true } })
const clock = new FakeClock(1_700_000_010_000)

describe("constructWebhookEvent", () => {
  it("verifies and parses a signed request", () => {
    const event = constructWebhookEvent(
      {
        payload: PAYLOAD,
        headers: {
          "X-Webhook-Signature": computeWebhookSignature(PAYLOAD, TS, "test-secret"),
          "X-Webhook-Timestamp": TS,
          "X-Webhook-ID": "evt_1",
        },
        secret: "test-secret",
      },
      clock,
    )

    expect(event).toEqual({
      event: "screenshot.completed",
      id: "evt_1",
      timestamp: 0,
      data: { ok: true },
    })
  })

  it("throws unauthorized when verification fails", () => {
    let caught: unknown
    try {
      constructWebhookEvent(
        {
          payload: PAYLOAD,
          headers: { "x-webhook-signature": "sha256=bad", "x-webhook-timestamp": TS },
          secret: "test-secret",
        },
        clock,
      )
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ApiError)
    expect(caught).toMatchObject({
      code: "unauthorized",
      httpStatus: 0,
      message: "Webhook signature verification failed",
    })
  })

  it("honors a custom tolerance", () => {
    const headers = {
      "x-webhook-signature": computeWebhookSignature(PAYLOAD, TS, "test-secret"),
      "x-webhook-timestamp": TS,
    }

    expect(() =>
      constructWebhookEvent({ payload: PAYLOAD, headers, secret: "test-secret", toleranceSeconds: 5 }, clock),
    ).toThrow("Webhook signature verification failed")
  })
})
