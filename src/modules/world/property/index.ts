export * from "./types";
export { PropertyServiceImpl, SYSTEM_ACTOR_ID, isOccupied, type PropertyService } from "./service";
export { RentalSweeper, type RentalSweepTarget } from "./sweeper";
