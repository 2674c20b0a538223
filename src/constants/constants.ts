// src/constants/constants.ts

/**
 * Temperature probe frame layout
 */
export const TEMP_FRAME = {
  LENGTH: 8,
  START_MARKER: 0x02,
  END_MARKER: 0x03,
  T1_OFFSET: 2,
  T2_OFFSET: 4,
  DISPLAY_MODE_OFFSET: 2,
  DISPLAY_DIGITS_OFFSET: 3,
  SCALE: 10,
} as const;

/**
 * Display-mode byte bits (BCD display frames)
 */
export const DISPLAY_MODE = {
  SIGN_NEGATIVE: 0x04,
  DECIMAL_POINT_MASK: 0x03,
} as const;

/**
 * Half-duplex poll protocol of the temperature probe
 */
export const TEMP_POLL = {
  COMMAND: 0x41, // 'A'
  RESPONSE_DELAY_MS: 200,
  READ_CHUNK_SIZE: 32,
  READ_TIMEOUT_MS: 1000,
  RETENTION_BYTES: 32,
  SETTLE_DELAY_MS: 2000,
  READ_INTERVAL_MS: 900_000,
  MAX_CONSECUTIVE_EMPTY_READS: 5,
  SELECTED_FRAME_INDEX: 1, // second valid frame of a cycle
} as const;

export const TEMPERATURE_RANGE = {
  MIN: 10,
  MAX: 100,
} as const;

export const FLOW_LINES = {
  BUFFER_SIZE: 1000,
  DEVICE_TIME_ZONE: 'Asia/Bangkok',
} as const;

export const SERIAL_DEFAULTS = {
  FLOW_PORT: '/dev/ttyUSB0',
  TEMP_PORT: '/dev/ttyUSB1',
  BAUD_RATE: 9600,
  CONNECT_ATTEMPTS: 3,
  CONNECT_RETRY_DELAY_MS: 5000,
  MAX_BUFFER_SIZE: 4096,
} as const;

/**
 * strptime %y pivot: 69-99 map to 19xx, 00-68 map to 20xx
 */
export const TWO_DIGIT_YEAR_PIVOT = 69;
