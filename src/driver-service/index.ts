export * from './driver-service.interface.js';
