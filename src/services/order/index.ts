export {
  OrderService,
  OrderServiceDeps,
  OrderConfig,
  CreateOrderDTO,
  CreatedOrder,
  OrderQueryOptions,
  Requester,
} from './order.service';
export { OrderController } from './order.controller';
export { createOrderRoutes } from './order.routes';
export { toOrderDTO, toQuoteDTO, OrderDTO, QuoteDTO } from './order.dto';
export { MaintenanceSweeper, MaintenanceSweeperDeps, SweepResult } from './order.sweeper';
export {
  isValidTransition,
  validateTransition,
  isTerminalState,
  getAllowedTransitions,
  statusesAllowing,
} from './order.state';
