import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  AddFaceRequestDto,
  AddFaceResultDto,
  DelFaceRequestDto,
  DelFaceResultDto,
  DelPersonRequestDto,
  DelPersonResultDto,
  DetectFaceRequestDto,
  DetectFaceResultDto,
  FaceCompareRequestDto,
  FaceCompareResultDto,
  FaceDto,
  FaceIdentifyRequestDto,
  FaceIdentifyResultDto,
  FaceVerifyRequestDto,
  FaceVerifyResultDto,
  GetFaceIdsRequestDto,
  GetFaceIdsResultDto,
  GetFaceInfoRequestDto,
  GetFaceInfoResultDto,
  GetGroupIdsRequestDto,
  GetGroupIdsResultDto,
  GetInfoRequestDto,
  GetInfoResultDto,
  GetPersonIdsRequestDto,
  GetPersonIdsResultDto,
  NewPersonRequestDto,
  NewPersonResultDto,
  SetInfoRequestDto,
  SetInfoResultDto,
} from './face.types';

export type WireBody = Record<string, unknown>;

/**
 * One remote procedure: its path segment, how a request maps onto the
 * snake_case wire body, and the schema that decodes the response.
 */
export interface YoutuOperation<Req, Rsp> {
  readonly name: string;
  toWire(request: Req, appId: string): WireBody;
  readonly responseSchema: ZodType<Rsp, ZodTypeDef, unknown>;
}

function defineOperation<Req, Rsp>(operation: YoutuOperation<Req, Rsp>): YoutuOperation<Req, Rsp> {
  return operation;
}

// Omitted or null fields decode to the zero value of their type.
const int = z.number().int().nullish().transform((value) => value ?? 0);
const num = z.number().nullish().transform((value) => value ?? 0);
const str = z.string().nullish().transform((value) => value ?? '');
const bool = z.boolean().nullish().transform((value) => value ?? false);
const strList = z.array(z.string()).nullish().transform((value) => value ?? []);

const statusFields = {
  errorcode: int,
  errormsg: str,
};

const faceSchema: ZodType<FaceDto, ZodTypeDef, unknown> = z
  .object({
    face_id: str,
    x: int,
    y: int,
    width: num,
    height: num,
    gender: int,
    age: int,
    expression: int,
    glass: bool,
    pitch: int,
    yaw: int,
    roll: int,
  })
  .transform((value) => ({
    faceId: value.face_id,
    x: value.x,
    y: value.y,
    width: value.width,
    height: value.height,
    gender: value.gender,
    age: value.age,
    expression: value.expression,
    glass: value.glass,
    pitch: value.pitch,
    yaw: value.yaw,
    roll: value.roll,
  }));

export function emptyFace(): FaceDto {
  return faceSchema.parse({});
}

function omitEmpty(body: WireBody, key: string, value: string | number | undefined): WireBody {
  if (value === undefined || value === '' || value === 0) {
    return body;
  }
  return { ...body, [key]: value };
}

export const detectFace = defineOperation<DetectFaceRequestDto, DetectFaceResultDto>({
  name: 'detectface',
  toWire: (request, appId) => omitEmpty({ app_id: appId, image: request.image }, 'mode', request.mode),
  responseSchema: z
    .object({
      session_id: str,
      image_id: str,
      image_width: int,
      image_height: int,
      face: z.array(faceSchema).nullish().transform((value) => value ?? []),
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      imageId: value.image_id,
      imageWidth: value.image_width,
      imageHeight: value.image_height,
      faces: value.face,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const faceCompare = defineOperation<FaceCompareRequestDto, FaceCompareResultDto>({
  name: 'facecompare',
  toWire: (request, appId) => ({ app_id: appId, imageA: request.imageA, imageB: request.imageB }),
  responseSchema: z
    .object({
      eyebrow_sim: num,
      eye_sim: num,
      nose_sim: num,
      mouth_sim: num,
      similarity: num,
      ...statusFields,
    })
    .transform((value) => ({
      eyebrowSim: value.eyebrow_sim,
      eyeSim: value.eye_sim,
      noseSim: value.nose_sim,
      mouthSim: value.mouth_sim,
      similarity: value.similarity,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const faceVerify = defineOperation<FaceVerifyRequestDto, FaceVerifyResultDto>({
  name: 'faceverify',
  toWire: (request, appId) => ({ app_id: appId, image: request.image, person_id: request.personId }),
  responseSchema: z
    .object({
      ismatch: bool,
      confidence: num,
      session_id: str,
      ...statusFields,
    })
    .transform((value) => ({
      isMatch: value.ismatch,
      confidence: value.confidence,
      sessionId: value.session_id,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const faceIdentify = defineOperation<FaceIdentifyRequestDto, FaceIdentifyResultDto>({
  name: 'faceidentify',
  toWire: (request, appId) => ({ app_id: appId, group_id: request.groupId, image: request.image }),
  responseSchema: z
    .object({
      session_id: str,
      person_id: str,
      face_id: str,
      confidence: num,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      personId: value.person_id,
      faceId: value.face_id,
      confidence: value.confidence,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const newPerson = defineOperation<NewPersonRequestDto, NewPersonResultDto>({
  name: 'newperson',
  toWire: (request, appId) => {
    const body = {
      app_id: appId,
      image: request.image,
      person_id: request.personId,
      group_ids: request.groupIds,
    };
    return omitEmpty(omitEmpty(body, 'person_name', request.personName), 'tag', request.tag);
  },
  responseSchema: z
    .object({
      session_id: str,
      suc_group: int,
      suc_face: int,
      person_name: str,
      person_id: str,
      face_id: str,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      sucGroup: value.suc_group,
      sucFace: value.suc_face,
      personName: value.person_name,
      personId: value.person_id,
      faceId: value.face_id,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const delPerson = defineOperation<DelPersonRequestDto, DelPersonResultDto>({
  name: 'delperson',
  toWire: (request, appId) => ({ app_id: appId, person_id: request.personId }),
  responseSchema: z
    .object({
      session_id: str,
      deleted: int,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      deleted: value.deleted,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const addFace = defineOperation<AddFaceRequestDto, AddFaceResultDto>({
  name: 'addface',
  toWire: (request, appId) =>
    omitEmpty({ app_id: appId, person_id: request.personId, images: request.images }, 'tag', request.tag),
  responseSchema: z
    .object({
      session_id: str,
      added: int,
      face_ids: strList,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      added: value.added,
      faceIds: value.face_ids,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const delFace = defineOperation<DelFaceRequestDto, DelFaceResultDto>({
  name: 'delface',
  toWire: (request, appId) => ({ app_id: appId, person_id: request.personId, face_ids: request.faceIds }),
  responseSchema: z
    .object({
      session_id: str,
      deleted: int,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      deleted: value.deleted,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const setInfo = defineOperation<SetInfoRequestDto, SetInfoResultDto>({
  name: 'setinfo',
  toWire: (request, appId) =>
    omitEmpty(omitEmpty({ app_id: appId, person_id: request.personId }, 'person_name', request.personName), 'tag', request.tag),
  responseSchema: z
    .object({
      session_id: str,
      person_id: str,
      ...statusFields,
    })
    .transform((value) => ({
      sessionId: value.session_id,
      personId: value.person_id,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const getInfo = defineOperation<GetInfoRequestDto, GetInfoResultDto>({
  name: 'getinfo',
  toWire: (request, appId) => ({ app_id: appId, person_id: request.personId }),
  responseSchema: z
    .object({
      person_name: str,
      person_id: str,
      group_ids: strList,
      face_ids: strList,
      session_id: str,
      ...statusFields,
    })
    .transform((value) => ({
      personName: value.person_name,
      personId: value.person_id,
      groupIds: value.group_ids,
      faceIds: value.face_ids,
      sessionId: value.session_id,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const getGroupIds = defineOperation<GetGroupIdsRequestDto, GetGroupIdsResultDto>({
  name: 'getgroupids',
  toWire: (_request, appId) => ({ app_id: appId }),
  responseSchema: z
    .object({
      group_ids: strList,
      ...statusFields,
    })
    .transform((value) => ({
      groupIds: value.group_ids,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const getPersonIds = defineOperation<GetPersonIdsRequestDto, GetPersonIdsResultDto>({
  name: 'getpersonids',
  toWire: (request, appId) => ({ app_id: appId, group_id: request.groupId }),
  responseSchema: z
    .object({
      person_ids: strList,
      ...statusFields,
    })
    .transform((value) => ({
      personIds: value.person_ids,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const getFaceIds = defineOperation<GetFaceIdsRequestDto, GetFaceIdsResultDto>({
  name: 'getfaceids',
  toWire: (request, appId) => ({ app_id: appId, person_id: request.personId }),
  responseSchema: z
    .object({
      face_ids: strList,
      ...statusFields,
    })
    .transform((value) => ({
      faceIds: value.face_ids,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const getFaceInfo = defineOperation<GetFaceInfoRequestDto, GetFaceInfoResultDto>({
  name: 'getfaceinfo',
  toWire: (request, appId) => ({ app_id: appId, face_id: request.faceId }),
  responseSchema: z
    .object({
      face_info: faceSchema.nullish().transform((value) => value ?? emptyFace()),
      ...statusFields,
    })
    .transform((value) => ({
      faceInfo: value.face_info,
      errorCode: value.errorcode,
      errorMsg: value.errormsg,
    })),
});

export const faceOperations = {
  detectFace,
  faceCompare,
  faceVerify,
  faceIdentify,
  newPerson,
  delPerson,
  addFace,
  delFace,
  setInfo,
  getInfo,
  getGroupIds,
  getPersonIds,
  getFaceIds,
  getFaceInfo,
} as const;
