export const APP_CONFIG = Symbol("APP_CONFIG");
export const AGENT = Symbol("AGENT");
export const MESSAGE_BUS = Symbol("MESSAGE_BUS");
export const CLOCK = Symbol("CLOCK");
