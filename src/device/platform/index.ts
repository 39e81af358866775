/**
 * Platform Detection
 *
 * Detects the device class once at startup and describes what it supports.
 */

export * from './detection.js';
