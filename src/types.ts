export type AnnotationValue =
  | null
  | boolean
  | number
  | string
  | AnnotationValue[]
  | Set<AnnotationValue>
  | AnnotationRecord;

export interface AnnotationRecord {
  [key: string]: AnnotationValue;
}

export type PixelDType =
  | 'uint8'
  | 'int8'
  | 'uint16'
  | 'int16'
  | 'uint32'
  | 'int32'
  | 'float32'
  | 'float64';

export interface RawImage {
  dtype: PixelDType;
  shape: number[];
  data: Buffer;
}

export type FrameTopic = 'VideoFrame' | 'JpegFrame' | 'LogFrame';

export type TopicKind = 'video' | 'jpeg' | 'log' | 'unknown';

export type ImageEncoding = 'raw' | 'jpeg';

export interface ImagePayload {
  kind: 'image';
  encoding: ImageEncoding;
  dtype: PixelDType;
  shape: number[];
  data: Buffer;
  annotation: AnnotationRecord;
}

export interface LogPayload {
  kind: 'log';
  annotation: AnnotationRecord;
}

export type Payload = ImagePayload | LogPayload;

export interface Envelope {
  topic: Exclude<TopicKind, 'unknown'>;
  rawTopic: string;
  sourceId: Buffer;
  frameTime: number;
  payload: Payload;
}

export type RoutedFrame =
  | {
      kind: 'image';
      sourceId: string;
      frameTime: number;
      image: RawImage;
      annotation: AnnotationRecord;
    }
  | {
      kind: 'log';
      sourceId: string;
      frameTime: number;
      annotation: AnnotationRecord;
    };

export type StoredImageEncoding = 'jpeg' | 'png';

export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export interface DisplayItem {
  sourceId: string;
  frameTime: number;
  image: RawImage;
}
