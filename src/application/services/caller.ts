import type { Principal } from "../../core/entities/principal.js";

/**
 * Who is calling and from where. `principal` is null for anonymous
 * requests.
 */
export interface Caller {
  readonly principal: Principal | null;
  readonly ip: string;
}
