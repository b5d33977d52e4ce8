import 'reflect-metadata';

// Silences the winston logger and keeps tests on the in-memory adapters
process.env.NODE_ENV = process.env.NODE_ENV || 'test';
delete process.env.QUEUE_DRIVER;
delete process.env.STORE_DRIVER;
delete process.env.NOTIFIER_DRIVER;
