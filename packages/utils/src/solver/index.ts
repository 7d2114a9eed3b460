/**
 * Warehouse planner - Solver Module
 *
 * Bin allocation, conveyor, truck optimization and the warehouse controller.
 */

export {
  StorageBin,
  BinRegistry,
  compareBins,
  validateBinRecord,
  type RegistryLoadResult
} from './binRegistry';

export { ConveyorQueue } from './conveyorQueue';

export { optimizeTruckLoad } from './truckLoadOptimizer';

export { TruckLoadStack } from './truckLoadStack';

export {
  WarehouseController,
  type WarehouseControllerDeps
} from './warehouseController';
