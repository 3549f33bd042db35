export * from './flow-reading-query.dto';
export * from './flow-reading-response.dto';
