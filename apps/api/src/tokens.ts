export const APP_CONFIG = Symbol('APP_CONFIG');
export const BROKER_POOL = Symbol('BROKER_POOL');
export const STORE_POOL = Symbol('STORE_POOL');
export const BROKER_CHANNEL = Symbol('BROKER_CHANNEL');
export const JOB_STORE = Symbol('JOB_STORE');
