export type Milliseconds = number
export type Seconds = number
export type UnixMs = number
