export type Milliseconds = number
export type Seconds = number

/** Milliseconds since the Unix epoch */
export type UnixMs = number

/** Whole seconds since the Unix epoch */
export type UnixSeconds = number
