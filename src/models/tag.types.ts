export type Tag = 'init' | 'configuration' | 'persistence' | 'storage';
