export interface GridCell {
  index: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PreviewGrid {
  perSide: number;
  cells: GridCell[];
}

/**
 * Square grid with `ceil(sqrt(count))` cells per side. Options fill the grid
 * column by column.
 */
export function layoutPreviewGrid(count: number, width: number, height: number): PreviewGrid {
  if (count <= 0) {
    return { perSide: 0, cells: [] };
  }
  const perSide = Math.ceil(Math.sqrt(count));
  const cellWidth = width / perSide;
  const cellHeight = height / perSide;
  const cells: GridCell[] = [];
  for (let index = 0; index < count; index += 1) {
    const column = Math.floor(index / perSide);
    const row = index % perSide;
    cells.push({
      index,
      x: column * cellWidth,
      y: row * cellHeight,
      width: cellWidth,
      height: cellHeight,
    });
  }
  return { perSide, cells };
}
