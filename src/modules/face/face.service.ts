import { NetworkError } from '../../common/errors/app-error';
import { buildInterfaceUrl, DEFAULT_TIMEOUT_MS, postSignedJson } from '../../infrastructure/youtu/youtu-json-client';
import type { Credential } from '../signature/signature.credential';
import { buildToken, systemSignatureSource, type SignatureSource } from '../signature/signature.service';
import {
  addFace,
  delFace,
  delPerson,
  detectFace,
  faceCompare,
  faceIdentify,
  faceVerify,
  getFaceIds,
  getFaceInfo,
  getGroupIds,
  getInfo,
  getPersonIds,
  newPerson,
  setInfo,
  type YoutuOperation,
} from './face.operations';
import {
  AddFaceResultDto,
  DelFaceResultDto,
  DelPersonResultDto,
  DetectFaceResultDto,
  DetectMode,
  FaceCompareResultDto,
  FaceIdentifyResultDto,
  FaceVerifyResultDto,
  GetFaceIdsResultDto,
  GetFaceInfoResultDto,
  GetGroupIdsResultDto,
  GetInfoResultDto,
  GetPersonIdsResultDto,
  NewPersonResultDto,
  SetInfoResultDto,
} from './face.types';

export const DEFAULT_HOST = 'api.youtu.qq.com';

export interface YoutuClientOptions {
  timeoutMs?: number;
  /** Log one line per call to the console. */
  debug?: boolean;
  signatureSource?: SignatureSource;
}

/**
 * Face detection and person management client. Holds no per-call state, so a
 * single instance can serve concurrent callers.
 */
export class YoutuClient {
  private readonly timeoutMs: number;
  private readonly debug: boolean;
  private readonly signatureSource: SignatureSource;

  constructor(
    private readonly credential: Credential,
    private readonly host: string = DEFAULT_HOST,
    options: YoutuClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? false;
    this.signatureSource = options.signatureSource ?? systemSignatureSource;
  }

  get appId(): string {
    return String(this.credential.appId);
  }

  /**
   * Runs one operation. Service-level failures come back in `errorCode` and
   * `errorMsg`; only encoding, transport and decoding problems throw.
   */
  async call<Req, Rsp>(operation: YoutuOperation<Req, Rsp>, request: Req): Promise<Rsp> {
    const start = Date.now();
    try {
      const response = await postSignedJson({
        url: buildInterfaceUrl(this.host, operation.name),
        body: operation.toWire(request, this.appId),
        authorization: buildToken(this.credential, this.signatureSource),
        timeoutMs: this.timeoutMs,
        schema: operation.responseSchema,
      });

      if (this.debug) {
        console.log(`[Youtu] POST ${operation.name} - ${response.statusCode} - ${Date.now() - start}ms`);
      }
      return response.data;
    } catch (error) {
      if (this.debug && error instanceof NetworkError) {
        console.error(`[Youtu] POST ${operation.name} failed after ${Date.now() - start}ms: ${error.message}`);
      }
      throw error;
    }
  }

  async detectFace(image: string, mode: DetectMode = DetectMode.Normal): Promise<DetectFaceResultDto> {
    return this.call(detectFace, { image, mode });
  }

  async faceCompare(imageA: string, imageB: string): Promise<FaceCompareResultDto> {
    return this.call(faceCompare, { imageA, imageB });
  }

  async faceVerify(image: string, personId: string): Promise<FaceVerifyResultDto> {
    return this.call(faceVerify, { image, personId });
  }

  async faceIdentify(image: string, groupId: string): Promise<FaceIdentifyResultDto> {
    return this.call(faceIdentify, { image, groupId });
  }

  async newPerson(
    image: string,
    personId: string,
    groupIds: string[],
    personName?: string,
    tag?: string,
  ): Promise<NewPersonResultDto> {
    return this.call(newPerson, { image, personId, groupIds, personName, tag });
  }

  async delPerson(personId: string): Promise<DelPersonResultDto> {
    return this.call(delPerson, { personId });
  }

  async addFace(images: string[], personId: string, tag?: string): Promise<AddFaceResultDto> {
    return this.call(addFace, { images, personId, tag });
  }

  async delFace(personId: string, faceIds: string[]): Promise<DelFaceResultDto> {
    return this.call(delFace, { personId, faceIds });
  }

  async setInfo(personId: string, personName?: string, tag?: string): Promise<SetInfoResultDto> {
    return this.call(setInfo, { personId, personName, tag });
  }

  async getInfo(personId: string): Promise<GetInfoResultDto> {
    return this.call(getInfo, { personId });
  }

  async getGroupIds(): Promise<GetGroupIdsResultDto> {
    return this.call(getGroupIds, {});
  }

  async getPersonIds(groupId: string): Promise<GetPersonIdsResultDto> {
    return this.call(getPersonIds, { groupId });
  }

  async getFaceIds(personId: string): Promise<GetFaceIdsResultDto> {
    return this.call(getFaceIds, { personId });
  }

  async getFaceInfo(faceId: string): Promise<GetFaceInfoResultDto> {
    return this.call(getFaceInfo, { faceId });
  }
}
