export * from './words';
export * from './users';
export * from './leaderboard';
export * from './profile';
