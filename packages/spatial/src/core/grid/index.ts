/**
 * Grid module - bit layers and the dense tile map.
 */

export { BitGrid } from "./bit-grid";
export { ASCII_LEGEND, type Tile, TileMap, TILES } from "./tile-map";
