// src/constants/constants.ts

/**
 * Stream frame layout: `0x94 0xC3 <len_hi> <len_lo> <payload>`
 */
export const FRAME = {
  MAGIC1: 0x94,
  MAGIC2: 0xc3,
  HEADER_SIZE: 4,
  MAX_PAYLOAD: 512,
} as const;

/**
 * Serial line settings fixed at open time.
 */
export const SERIAL_LINE = {
  DEFAULT_BAUD_RATE: 115200,
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 921600,
  DATA_BITS: 8,
  STOP_BITS: 1,
  PARITY: 'none',
} as const;

export const KEEPALIVE = {
  DEFAULT_INTERVAL_MS: 10_000,
  MAX_NONCE: 0xffff,
} as const;

/**
 * USB vendor ids of the serial bridges found on common mesh radios.
 */
export const KNOWN_RADIO_VENDOR_IDS: readonly string[] = [
  '239a', // Adafruit / nRF52840 boards (T-Echo, RAK4631)
  '303a', // Espressif native USB
  '10c4', // Silicon Labs CP210x
  '1a86', // WCH CH340 / CH9102
  '0403', // FTDI
];

/**
 * Meshtastic application port numbers used by this library.
 */
export const PORT_NUMS = {
  UNKNOWN_APP: 0,
  TEXT_MESSAGE_APP: 1,
  PRIVATE_APP: 256,
} as const;

export const BROADCAST_ADDR = 0xffffffff;

export const HEALTH_REPORT_VERSION = 1;
