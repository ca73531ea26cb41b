import { IQueueStrategy } from "./IQueueStrategy";
import { IUserRegistry, UserRecord } from "./IUserRegistry";

export { IQueueStrategy, IUserRegistry, UserRecord };
