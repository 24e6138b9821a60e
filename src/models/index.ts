/**
 * Central export point for all models
 * Allows clean imports: import { Portfolio, Position } from '@/models'
 */

export * from './User';
export * from './Security';
export * from './Portfolio';
export * from './Position';
export * from './Trade';
