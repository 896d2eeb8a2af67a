import { paletteName } from "../core/types";
import { timerProgress } from "../utils/timer";

import type { BlockId, BlockState, PaletteName } from "../core/types";
import type { GameState } from "../types";

/**
 * Read-only render model of the playfield. A renderer interpolates swaps
 * from `fromCol` to `col` and settle or despawn effects by `progress`; the
 * engine itself never animates.
 */
export type BlockRenderModel = Readonly<{
  id: BlockId;
  color: PaletteName;
  state: BlockState;
  col: number;
  row: number;
  /** Elapsed fraction of the current delay, 0 when there is none */
  progress: number;
  /** Swap source column while moving, otherwise null */
  fromCol: number | null;
}>;

export type BoardRenderModel = Readonly<{
  width: number;
  height: number;
  blocks: ReadonlyArray<BlockRenderModel>;
}>;

export function selectBoardRenderModel(s: GameState): BoardRenderModel {
  const blocks = [...s.blocks.values()]
    .sort((a, b) => a.id - b.id)
    .map(
      (b): BlockRenderModel => ({
        col: b.col,
        color: paletteName(b.color),
        fromCol: b.moveFromCol,
        id: b.id,
        progress: timerProgress(b.timer),
        row: b.row,
        state: b.state,
      }),
    );
  return { blocks, height: s.grid.height, width: s.grid.width };
}
