// HashVec.toString shows at most this many entries
export const TO_STRING_PREVIEW = 16;
