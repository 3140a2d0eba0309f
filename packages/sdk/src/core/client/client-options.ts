import { z } from "zod"
import { transportOptionsSchema } from "../transport/transport-options"

export const clientOptionsSchema = transportOptionsSchema.extend({
  /** Default signing secret (rs_secret_*) for generateUrl */
  signingKey: z.string().optional(),
  /** Default public key id (rs_pub_*) for generateUrl */
  publicKeyId: z.string().optional(),
})

export type ClientOptionsInput = z.input<typeof clientOptionsSchema>
export type ClientOptions = Readonly<z.output<typeof clientOptionsSchema>>
