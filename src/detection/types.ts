export type RawOutput = ArrayLike<number>;

export type GridLayout = {
  /** Grid side length (S). */
  gridSize: number;
  /** Number of classes (C). */
  classCount: number;
  /** Boxes predicted per grid cell (B). */
  boxesPerCell: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

export type RawBox = {
  x: number;
  y: number;
  w: number;
  h: number;
};

export type CenterBox = {
  cx: number;
  cy: number;
  width: number;
  height: number;
};

export type Candidate = {
  classId: number;
  box: CenterBox;
  score: number;
};

export type Detection = {
  label: string;
  classId: number;
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
  score: number;
};

export type CornerBox = {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
};
