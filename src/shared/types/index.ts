export * from './payment.types';
