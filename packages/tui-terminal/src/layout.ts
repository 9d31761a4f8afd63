import type { View } from '@wingetdash/shared'

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export interface TabRegion {
  view: View
  /** First column of the tab */
  start: number
  /** Column after the last one */
  end: number
}

/**
 * Screen regions of the last rendered frame, used for mouse hit-testing
 */
export interface LayoutRegions {
  tabBar: Rect
  tabs: readonly TabRegion[]
  filterBar: Rect
  searchBar: Rect
  packageList: Rect
  /** Screen row of the first package row */
  listContentY: number
  listRows: number
  scrollOffset: number
  /** Column of the scrollbar, or null when the list fits */
  scrollbarX: number | null
}

export function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height
}
