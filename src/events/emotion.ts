/**
 * Emotion tags for outbound frames.
 * Progress events carry a fixed tag per kind; final answers are classified from their
 * content with an ordered keyword table where the first matching rule wins.
 * Rule order is observable behavior: do not reorder.
 */

import type { ProgressEvent, ProgressFrame } from "./types";

export interface EmotionRule {
  pattern: RegExp;
  emotion: string;
}

export const EMOTION_RULES: readonly EmotionRule[] = [
  // Negative
  { pattern: /抱歉|对不起|不好意思|很遗憾|无法|做不到|失败|出错|错误|error|fail/, emotion: "sad" },
  { pattern: /不知道|不确定|不太清楚|不了解/, emotion: "confused" },
  { pattern: /危险|警告|注意|小心|千万不要|禁止/, emotion: "shocked" },
  { pattern: /哈哈|哈哈哈|23333|笑死|太搞笑|逗/, emotion: "laughing" },
  // Positive
  { pattern: /完成|搞定|成功|装好|已安装|已配置|已创建|已修改|已删除|已更新|好了|弄好/, emotion: "happy" },
  { pattern: /太好了|太棒了|厉害|不错|很好|恭喜|棒|赞|nice|great|awesome/, emotion: "happy" },
  { pattern: /好的|收到|明白|了解|可以|没问题|当然/, emotion: "winking" },
  { pattern: /你好|嗨|hello|hi|hey|早上好|晚上好|下午好/, emotion: "happy" },
  // Content-specific
  { pattern: /天气.*晴|阳光|温暖/, emotion: "happy" },
  { pattern: /天气.*雨|下雨|暴雨/, emotion: "sad" },
  { pattern: /好吃|美食|推荐.*餐|食谱/, emotion: "delicious" },
  { pattern: /爱|喜欢|❤|最爱|太美/, emotion: "loving" },
  { pattern: /累|疲|困了|睡觉|休息/, emotion: "sleepy" },
  { pattern: /酷|帅|牛|666|nb|强/, emotion: "cool" },
  { pattern: /嗯|让我想想|这个问题/, emotion: "thinking" },
  { pattern: /惊|wow|哇|居然|没想到|竟然/, emotion: "surprised" },
  { pattern: /尴尬|emmm|额|呃/, emotion: "embarrassed" },
  { pattern: /生气|愤怒|气死|烦|讨厌/, emotion: "angry" },
];

export const DEFAULT_EMOTION = "neutral";

export const PROGRESS_EMOTIONS: Readonly<Record<ProgressEvent["type"], string>> = {
  thinking: "thinking",
  tool_call: "gear",
  tool_result: "cool",
};

/** Classify response text; first matching rule wins, `neutral` otherwise. */
export function detectEmotion(text: string): string {
  const lower = text.toLowerCase();
  for (const rule of EMOTION_RULES) {
    if (rule.pattern.test(lower)) return rule.emotion;
  }
  return DEFAULT_EMOTION;
}

/** Attach the fixed emotion tag of a progress event. */
export function enrichEvent(event: ProgressEvent): ProgressFrame {
  return { ...event, emotion: PROGRESS_EMOTIONS[event.type] };
}
