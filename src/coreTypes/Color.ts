export type Color = {
  r: number;
  g: number;
  b: number;
  a: number;
};
