export * from './astrology';
export * from './chat';
export * from './discover';
export * from './error';
export * from './match';
export * from './report';
export * from './temple';
export * from './user';
