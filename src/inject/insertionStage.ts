import { Mutex } from "async-mutex";
import { InsertionError, describeError } from "../errors";
import type { IInputInjector } from "../types/contracts";

/**
 * Pastes into the focused window. The clipboard and focus are shared by
 * every run, so only one insertion executes at a time.
 */
export class InsertionStage {
  private readonly lock = new Mutex();

  constructor(private readonly injector: IInputInjector) {}

  insert(text: string): Promise<void> {
    return this.lock.runExclusive(async () => {
      try {
        await this.injector.insert(text);
      } catch (error) {
        throw new InsertionError(`Insertion failed: ${describeError(error)}`, { cause: error });
      }
    });
  }
}
