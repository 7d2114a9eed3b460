/**
 * Warehouse planner - Type Definitions
 */

export * from './warehouseTypes';
