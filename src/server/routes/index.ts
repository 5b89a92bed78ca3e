export { createRoomRouter } from './rooms.js';
export { createMachineRouter } from './machines.js';
export { createUserRouter } from './users.js';
export { createReportRouter } from './reports.js';
