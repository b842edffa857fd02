export const POLLY_CLIENT = 'POLLY_CLIENT';
