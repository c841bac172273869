export {
  splitByLength,
  joinSegments,
  type Segment,
  type SegmentCut,
} from "./Segmenter.js";
