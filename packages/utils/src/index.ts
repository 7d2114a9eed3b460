/**
 * Warehouse planner engines.
 *
 * - Best-fit bin allocation over a capacity-ordered registry
 * - FIFO conveyor feeding the allocator
 * - Truck load subset optimization
 * - LIFO truck load stack with undo
 */

// Types - pure type definitions only
export * from './types';

// Solver - allocation, truck planning, controller
export * from './solver';
