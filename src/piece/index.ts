export { Source } from './source';
export { Piece } from './piece';
