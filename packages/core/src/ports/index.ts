export * from './clockPort.js';
export * from './experience-sink-port.js';
