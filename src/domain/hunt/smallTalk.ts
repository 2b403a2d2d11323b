export type SmallTalkReply = 'beer' | 'cheers' | 'greeting' | 'unknown';

const greetingWords = ['servus', 'hallo', 'hello', 'hi', 'hey'];

export function classifySmallTalk(text: string): SmallTalkReply {
  const normalized = text.toLowerCase();

  if (normalized.includes('beer') || normalized.includes('bier')) {
    return 'beer';
  }

  if (normalized.includes('prost') || normalized.includes('cheers')) {
    return 'cheers';
  }

  const words = normalized.split(/[^\p{L}]+/u).filter((word) => word.length > 0);
  if (words.some((word) => greetingWords.includes(word))) {
    return 'greeting';
  }

  return 'unknown';
}
