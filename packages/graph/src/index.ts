/**
 * @reelgraph/graph
 *
 * Filter graph model:
 * - Stream metadata and scenes
 * - Sources, filters, codecs and the connection protocol
 * - Filter graph rendering
 * - Stream vectors
 * - Buffering analysis
 */

// Errors
export {
  ReelgraphError,
  ConnectionError,
  NoFreeSlotError,
  CyclicGraphError,
  DanglingOutputError,
  UnresolvedReferenceError,
  IncompatibleStreamsError,
  VectorLengthMismatchError,
  MetadataRequiredError,
  InvalidParamsError,
} from './errors.js';

// Metadata
export {
  KIND_TAG,
  videoMeta,
  audioMeta,
  joinStreams,
  withDuration,
  type StreamKind,
  type KindTag,
  type Scene,
  type Device,
  type VideoMeta,
  type AudioMeta,
  type Metadata,
  type VideoMetaInit,
  type AudioMetaInit,
} from './meta.js';

// Nodes
export {
  GraphNode,
  Stream,
  Source,
  Filter,
  Codec,
  connect,
  pipe,
  type Owner,
  type Destination,
  type SourceStreamInit,
} from './base.js';

// Filters
export {
  Split,
  Concat,
  Overlay,
  Scale,
  Crop,
  Trim,
  SetPTS,
  Format,
  Upload,
  Volume,
  TIME_EPSILON,
  createFilter,
  filterSpecSchema,
  parseParams,
  type FilterSpec,
  type FilterType,
  type SplitParams,
  type ConcatParams,
  type OverlayParams,
  type ScaleParams,
  type CropParams,
  type TrimParams,
  type SetPTSParams,
  type FormatParams,
  type UploadParams,
  type VolumeParams,
} from './filters.js';

// Rendering
export { FilterGraph, type GraphForm, type RenderedGraph } from './assembler.js';

// Vectors
export { StreamVector, paramsKey, type FilterConstructor } from './vector.js';

// Buffering
export {
  analyzeBuffering,
  sceneLag,
  type BufferingHazard,
  type BufferingOptions,
  type BufferingReport,
  type SceneUse,
  type TimelineEntry,
} from './buffering.js';

// Scaler
export {
  Scaler,
  xround,
  type RoundingMode,
  type Size,
  type CropBox,
  type ScalerOptions,
} from './scaler.js';
