export * from './auth/auth.zod';
export * from './database/database.zod';
