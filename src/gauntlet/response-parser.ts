import { ResponseParseError, errorMessage } from '../errors';

const FENCE = '```';

/**
 * 取出第一个 markdown 代码块的内容；没有代码块或代码块为空时返回 null
 */
function extractFirstFencedBlock(text: string): string | null {
  const blockLines: string[] = [];
  let inBlock = false;

  for (const line of text.split('\n')) {
    if (line.trim().startsWith(FENCE)) {
      if (inBlock) break;
      inBlock = true;
      continue;
    }
    if (inBlock) blockLines.push(line);
  }

  return blockLines.length > 0 ? blockLines.join('\n').trim() : null;
}

/**
 * 从模型的自由文本输出中恢复时间字符串数组
 *
 * 处理顺序：去空白 → 取第一个代码块 → 截取第一个 [ 到最后一个 ] → JSON 解析。
 * 文本中完全没有方括号时截取不生效，交由 JSON 解析失败。
 */
export function parseAgentResponse(raw: string): string[] {
  let text = raw.trim();

  if (text.includes(FENCE)) {
    const block = extractFirstFencedBlock(text);
    if (block !== null) text = block;
  }

  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start !== -1 && end !== -1) {
    text = text.slice(start, end + 1);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ResponseParseError(`无法解析模型输出为 JSON: ${errorMessage(error)}`);
  }

  if (!Array.isArray(parsed)) {
    throw new ResponseParseError('模型输出不是 JSON 数组');
  }

  const result: string[] = [];
  for (const [index, item] of parsed.entries()) {
    if (typeof item !== 'string') {
      throw new ResponseParseError(`数组第 ${index} 项不是字符串: ${JSON.stringify(item)}`);
    }
    result.push(item);
  }
  return result;
}
