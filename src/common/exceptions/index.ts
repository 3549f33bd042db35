export * from './flowmeter.exceptions';
