import type { Coord, PieceKind, Player, PromotionKind } from "../types.ts";

export interface MoveRecord {
  readonly kind: PieceKind;
  readonly owner: Player;
  readonly from: Coord;
  readonly to: Coord;
  /** Set once the pawn's promotion piece has been chosen. */
  readonly promotion?: PromotionKind;
}

export function makeMoveRecord(args: {
  kind: PieceKind;
  owner: Player;
  from: Coord;
  to: Coord;
  promotion?: PromotionKind;
}): MoveRecord {
  const record: MoveRecord = {
    kind: args.kind,
    owner: args.owner,
    from: { ...args.from },
    to: { ...args.to },
    ...(args.promotion ? { promotion: args.promotion } : {}),
  };
  return Object.freeze(record);
}
