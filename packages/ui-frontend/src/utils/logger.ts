import { createScopedLogger } from '@cupcake-vending/logger';

export const logger = createScopedLogger('ui', { format: 'pretty', colors: false });
