// COSMAC VIP 4K memory map. The interpreter keeps all CHIP-8 visible state inside
// this address space, so a raw dump of memory is a complete machine snapshot.
//
// 0x000 +--------------------------------------+
//       | glyphs 0-F (5 bytes each)            |
// 0x050 | glyph address table (16 x u16)       |
//       | rest of reserved interpreter area    |
// 0x200 +--------------------------------------+
//       | user program (3232 bytes)            |
// 0xEA0 +--------------------------------------+
//       | CHIP-8 stack (48 bytes, 12 slots)    |
// 0xED0 +--------------------------------------+
//       | interpreter work area (48 bytes)     |
//       | 0xEF0-0xEFF hold V0-VF               |
// 0xF00 +--------------------------------------+
//       | display refresh (256 bytes)          |
// 0x1000+--------------------------------------+

export const MEMORY_SIZE = 0x1000;
export const MEMORY_START_ADDRESS = 0x000;

export const GLYPH_START_ADDRESS = 0x000;
export const GLYPH_BYTES = 5;
export const GLYPH_COUNT = 16;
export const GLYPH_TABLE_ADDRESS = GLYPH_START_ADDRESS + GLYPH_COUNT * GLYPH_BYTES;

export const PROGRAM_START_ADDRESS = 0x200;
export const STACK_START_ADDRESS = 0xea0;
export const INTERPRETER_WORK_AREA_START_ADDRESS = 0xed0;
export const DISPLAY_START_ADDRESS = 0xf00;

export const PROGRAM_LAST_ADDRESS = STACK_START_ADDRESS - 1;
export const MAX_PROGRAM_SIZE = PROGRAM_LAST_ADDRESS - PROGRAM_START_ADDRESS + 1;

export const STACK_DEPTH = 12;
export const STACK_FULL_ADDRESS = STACK_START_ADDRESS + STACK_DEPTH * 2;

// Work area fields
export const PROGRAM_COUNTER_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS;
export const I_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 2;
export const STACK_POINTER_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 4;
export const DELAY_TIMER_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 6;
export const TONE_TIMER_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 7;
export const KEY_STATUS_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 8;
export const KEY_WAIT_STATE_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 10;
export const KEY_WAIT_REGISTER_ADDRESS = INTERPRETER_WORK_AREA_START_ADDRESS + 11;
export const V_REGISTERS_ADDRESS = DISPLAY_START_ADDRESS - 16;

// Hex-key status word: 0 when no key is down, KEY_PRESSED_FLAG | key otherwise.
export const KEY_PRESSED_FLAG = 0x0100;

export const DISPLAY_WIDTH_PIXELS = 64;
export const DISPLAY_HEIGHT_PIXELS = 32;
export const DISPLAY_BYTES_PER_ROW = DISPLAY_WIDTH_PIXELS / 8;
export const DISPLAY_SIZE = DISPLAY_BYTES_PER_ROW * DISPLAY_HEIGHT_PIXELS;
