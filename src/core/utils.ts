/**
 * 文件读取工具
 */

import fs from "fs";
import { TextDecoder } from "util";

// fatal: 遇到非法 UTF-8 字节时抛出 TypeError，而不是替换为 U+FFFD
// ignoreBOM: 保留 BOM，写回时原样输出
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * 以严格 UTF-8 读取文件
 * 非法字节序列抛出 code 为 ERR_ENCODING_INVALID_ENCODED_DATA 的 TypeError
 */
export function readUtf8File(filePath: string): string {
  return utf8Decoder.decode(fs.readFileSync(filePath));
}
