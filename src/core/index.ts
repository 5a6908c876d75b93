/**
 * Core Module
 */

export * from './bus-stops';
export * from './geolocation';
