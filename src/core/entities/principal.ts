/**
 * The acting party of a request, decoded from its bearer token.
 * Role names are kept as given; unknown names simply carry no rank.
 */
export interface Principal {
  readonly id: string;
  readonly userName?: string | undefined;
  readonly roles: readonly string[];
}
