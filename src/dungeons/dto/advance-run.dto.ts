import { z } from 'zod';

export const AdvanceRunBodySchema = z.object({
  // 미지정 시 전투력 기준 자동 선택
  approachName: z.string().min(1).max(100).optional(),
  // 클라이언트가 보고 있는 방 번호: 다르면 ROOM_INDEX_MISMATCH
  expectedRoomIndex: z.number().int().min(0).optional(),
});

export type AdvanceRunBody = z.infer<typeof AdvanceRunBodySchema>;
