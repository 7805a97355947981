export * from './auth-context.decorator';
export * from './bearer-auth.guard';
export * from './request-context';
