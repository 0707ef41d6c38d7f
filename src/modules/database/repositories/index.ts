export * from './categories.repository';
export * from './comments.repository';
export * from './posts.repository';
export * from './sessions.repository';
export * from './users.repository';
