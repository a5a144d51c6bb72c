// Defaults shared by the queue, status channel and connection manager

/** Commands held by the queue, pending plus in flight */
export const DEFAULT_QUEUE_CAPACITY = 128;

export const DEFAULT_COMMAND_TIMEOUT = 5000; // ms

export const DEFAULT_STATUS_POLL_INTERVAL = 250; // ms

/** Shortest status poll interval accepted by setPollInterval */
export const MIN_STATUS_POLL_INTERVAL = 10; // ms

export const DEFAULT_CONNECT_TIMEOUT = 5000; // ms

export const DEFAULT_BAUD_RATE = 115200;

/** Telnet port of the common ESP32 and ESP8266 GRBL bridges */
export const DEFAULT_TCP_PORT = 23;

export const DEFAULT_WEBSOCKET_PING_INTERVAL = 30000; // ms
