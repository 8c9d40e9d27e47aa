export enum DetectMode {
  Normal = 0,
  BigFace = 1,
}

/** Fields present on every response. `errorCode` 0 means the payload fields are valid. */
export interface ServiceStatusDto {
  errorCode: number;
  errorMsg: string;
}

export interface FaceDto {
  faceId: string;
  x: number;
  y: number;
  width: number;
  height: number;
  /** 0 (female) to 100 (male). */
  gender: number;
  age: number;
  /** 0 normal, 50 smile, 100 laugh. */
  expression: number;
  glass: boolean;
  pitch: number;
  yaw: number;
  roll: number;
}

export interface DetectFaceRequestDto {
  image: string;
  mode?: DetectMode;
}

export interface DetectFaceResultDto extends ServiceStatusDto {
  sessionId: string;
  imageId: string;
  imageWidth: number;
  imageHeight: number;
  faces: FaceDto[];
}

export interface FaceCompareRequestDto {
  imageA: string;
  imageB: string;
}

export interface FaceCompareResultDto extends ServiceStatusDto {
  eyebrowSim: number;
  eyeSim: number;
  noseSim: number;
  mouthSim: number;
  similarity: number;
}

export interface FaceVerifyRequestDto {
  image: string;
  personId: string;
}

export interface FaceVerifyResultDto extends ServiceStatusDto {
  isMatch: boolean;
  confidence: number;
  sessionId: string;
}

export interface FaceIdentifyRequestDto {
  image: string;
  groupId: string;
}

export interface FaceIdentifyResultDto extends ServiceStatusDto {
  sessionId: string;
  personId: string;
  faceId: string;
  confidence: number;
}

export interface NewPersonRequestDto {
  image: string;
  personId: string;
  groupIds: string[];
  personName?: string;
  tag?: string;
}

export interface NewPersonResultDto extends ServiceStatusDto {
  sessionId: string;
  sucGroup: number;
  sucFace: number;
  personName: string;
  personId: string;
  faceId: string;
}

export interface DelPersonRequestDto {
  personId: string;
}

export interface DelPersonResultDto extends ServiceStatusDto {
  sessionId: string;
  deleted: number;
}

export interface AddFaceRequestDto {
  personId: string;
  images: string[];
  tag?: string;
}

export interface AddFaceResultDto extends ServiceStatusDto {
  sessionId: string;
  added: number;
  faceIds: string[];
}

export interface DelFaceRequestDto {
  personId: string;
  faceIds: string[];
}

export interface DelFaceResultDto extends ServiceStatusDto {
  sessionId: string;
  deleted: number;
}

export interface SetInfoRequestDto {
  personId: string;
  personName?: string;
  tag?: string;
}

export interface SetInfoResultDto extends ServiceStatusDto {
  sessionId: string;
  personId: string;
}

export interface GetInfoRequestDto {
  personId: string;
}

export interface GetInfoResultDto extends ServiceStatusDto {
  personName: string;
  personId: string;
  groupIds: string[];
  faceIds: string[];
  sessionId: string;
}

export type GetGroupIdsRequestDto = Record<string, never>;

export interface GetGroupIdsResultDto extends ServiceStatusDto {
  groupIds: string[];
}

export interface GetPersonIdsRequestDto {
  groupId: string;
}

export interface GetPersonIdsResultDto extends ServiceStatusDto {
  personIds: string[];
}

export interface GetFaceIdsRequestDto {
  personId: string;
}

export interface GetFaceIdsResultDto extends ServiceStatusDto {
  faceIds: string[];
}

export interface GetFaceInfoRequestDto {
  faceId: string;
}

export interface GetFaceInfoResultDto extends ServiceStatusDto {
  faceInfo: FaceDto;
}
