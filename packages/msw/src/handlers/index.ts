import { googleHandlers } from './google';

export * from './google';

export const defaultHandlers = [...googleHandlers];
