export const APP_CONFIG = Symbol("APP_CONFIG");
export const OBJECT_STORE = Symbol("OBJECT_STORE");
export const DETECTOR = Symbol("DETECTOR");
export const SUMMARIZER = Symbol("SUMMARIZER");
