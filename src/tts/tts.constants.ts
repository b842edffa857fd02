export const SYNTHESIS_CLIENT = 'SYNTHESIS_CLIENT';
