import { describe, it, expect } from "vitest";
import { Lexer, tokenize, LexerError } from "./lexer.js";
import { ChunkSource, StringSource, END_OF_INPUT } from "./source.js";
import { Token, TokenKind } from "../token/token.js";

function kinds(tokens: Token[]): TokenKind[] {
  return tokens.map((t) => t.kind);
}

function literals(tokens: Token[]): string[] {
  return tokens.map((t) => t.literal);
}

describe("Lexer", () => {
  describe("basic tokens", () => {
    it("should tokenize empty input", () => {
      const tokens = tokenize("");
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(TokenKind.EOF);
    });

    it("should tokenize identifiers", () => {
      const tokens = tokenize("foo bar2 X");
      expect(kinds(tokens)).toEqual([TokenKind.IDENT, TokenKind.IDENT, TokenKind.IDENT, TokenKind.EOF]);
      expect(literals(tokens)).toEqual(["foo", "bar2", "X", ""]);
    });

    it("should tokenize keywords", () => {
      const tokens = tokenize("def extern define");
      expect(kinds(tokens)).toEqual([TokenKind.DEF, TokenKind.EXTERN, TokenKind.IDENT, TokenKind.EOF]);
      expect(tokens[2].literal).toBe("define");
    });

    it("should return other characters one at a time", () => {
      const tokens = tokenize("+-*<(),;");
      expect(kinds(tokens).slice(0, -1).every((k) => k === TokenKind.CHAR)).toBe(true);
      expect(literals(tokens)).toEqual(["+", "-", "*", "<", "(", ")", ",", ";", ""]);
    });

    it("should not treat underscore as part of an identifier", () => {
      const tokens = tokenize("a_b");
      expect(kinds(tokens)).toEqual([TokenKind.IDENT, TokenKind.CHAR, TokenKind.IDENT, TokenKind.EOF]);
      expect(literals(tokens)).toEqual(["a", "_", "b", ""]);
    });

    it("should skip all kinds of whitespace", () => {
      const tokens = tokenize(" \t\na\r\n\v\fb ");
      expect(literals(tokens)).toEqual(["a", "b", ""]);
    });

    it("should keep returning EOF at end of input", () => {
      const lexer = new Lexer("x");
      expect(lexer.nextToken().kind).toBe(TokenKind.IDENT);
      expect(lexer.nextToken().kind).toBe(TokenKind.EOF);
      expect(lexer.nextToken().kind).toBe(TokenKind.EOF);
    });
  });

  describe("numbers", () => {
    it("should tokenize numbers with their values", () => {
      const tokens = tokenize("42 3.14 .5 7.");
      const values = tokens.flatMap((t) => (t.kind === TokenKind.NUMBER ? [t.value] : []));
      expect(values).toEqual([42, 3.14, 0.5, 7]);
      expect(literals(tokens)).toEqual(["42", "3.14", ".5", "7.", ""]);
    });

    it("should end a number at the first other character", () => {
      const tokens = tokenize("12abc");
      expect(kinds(tokens)).toEqual([TokenKind.NUMBER, TokenKind.IDENT, TokenKind.EOF]);
      expect(tokens[1].literal).toBe("abc");
    });

    it("should reject numbers with several dots", () => {
      expect(() => tokenize("1.2.3")).toThrow(LexerError);
      expect(() => tokenize("1.2.3")).toThrow("invalid number literal '1.2.3' at line 1, column 1");
    });

    it("should reject a lone dot", () => {
      expect(() => tokenize("a + .")).toThrow("invalid number literal '.' at line 1, column 5");
    });

    it("should carry the offending text on the error", () => {
      const lexer = new Lexer("  1..2");
      try {
        lexer.nextToken();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LexerError);
        if (err instanceof LexerError) {
          expect(err.lexeme).toBe("1..2");
          expect(err.position.column).toBe(2);
        }
      }
    });

    it("should reject numbers too large for a double", () => {
      const digits = "9".repeat(400);
      expect(() => tokenize(digits)).toThrow(LexerError);
      expect(() => tokenize(`x ${digits}`)).toThrow(`number literal '${digits}' is out of range at line 1, column 3`);
    });

    it("should accept the largest finite powers of ten", () => {
      const [tok] = tokenize("1" + "0".repeat(308));
      expect(tok.kind === TokenKind.NUMBER && tok.value).toBe(1e308);
      expect(() => tokenize("1" + "0".repeat(309))).toThrow(LexerError);
    });

    it("should continue after a malformed number", () => {
      const lexer = new Lexer("1.2.3 x");
      expect(() => lexer.nextToken()).toThrow(LexerError);
      const tok = lexer.nextToken();
      expect(tok.kind).toBe(TokenKind.IDENT);
      expect(tok.literal).toBe("x");
    });
  });

  describe("comments", () => {
    it("should skip a comment line", () => {
      const tokens = tokenize("#comment\n42");
      expect(tokens).toHaveLength(2);
      expect(tokens[0].kind).toBe(TokenKind.NUMBER);
      expect(tokens[0].literal).toBe("42");
      expect(tokens[1].kind).toBe(TokenKind.EOF);
    });

    it("should yield EOF for a comment at end of input", () => {
      const tokens = tokenize("# no newline");
      expect(kinds(tokens)).toEqual([TokenKind.EOF]);
    });

    it("should end a comment at a carriage return", () => {
      const tokens = tokenize("1 # one\r2");
      expect(literals(tokens)).toEqual(["1", "2", ""]);
    });

    it("should skip consecutive comments", () => {
      const tokens = tokenize("# a\n# b\n\n  # c\nx # d");
      expect(literals(tokens)).toEqual(["x", ""]);
    });
  });

  describe("positions", () => {
    it("should track offsets, lines and columns", () => {
      const tokens = tokenize("def f\n  x", "test.kal");
      expect(tokens[0].start).toEqual({ offset: 0, line: 0, column: 0, file: "test.kal" });
      expect(tokens[1].start).toEqual({ offset: 4, line: 0, column: 4, file: "test.kal" });
      expect(tokens[1].end).toEqual({ offset: 5, line: 0, column: 5, file: "test.kal" });
      expect(tokens[2].start).toEqual({ offset: 8, line: 1, column: 2, file: "test.kal" });
      expect(tokens[3].start).toEqual({ offset: 9, line: 1, column: 3, file: "test.kal" });
    });

    it("should count a lone carriage return as a line break", () => {
      const tokens = tokenize("a\rb\r\nc\nd");
      expect(tokens.map((t) => [t.start.offset, t.start.line, t.start.column])).toEqual([
        [0, 0, 0],
        [2, 1, 0],
        [5, 2, 0],
        [7, 3, 0],
        [8, 3, 1],
      ]);
    });

    it("should start a new line after a comment ended by a carriage return", () => {
      const tokens = tokenize("# c\rx");
      expect(tokens[0].start).toEqual({ offset: 4, line: 1, column: 0, file: "<stdin>" });
    });

    it("should default the file name to <stdin>", () => {
      const tokens = tokenize("x");
      expect(tokens[0].start.file).toBe("<stdin>");
    });
  });

  describe("sources", () => {
    it("should join a surrogate pair split across chunks", () => {
      const lexer = new Lexer(new ChunkSource(["a\uD83D", "\uDE00b"]));
      const tokens: Token[] = [];
      let tok: Token;
      do {
        tok = lexer.nextToken();
        tokens.push(tok);
      } while (tok.kind !== TokenKind.EOF);
      expect(literals(tokens)).toEqual(["a", "\uD83D\uDE00", "b", ""]);
      expect(literals(tokens)).toEqual(literals(tokenize("a\uD83D\uDE00b")));
    });

    it("should still yield a high surrogate that ends the last chunk", () => {
      const source = new ChunkSource(["x\uD83D"]);
      expect(source.read()).toBe("x");
      expect(source.read()).toBe("\uD83D");
      expect(source.read()).toBe(END_OF_INPUT);
      expect(source.read()).toBe(END_OF_INPUT);
    });

    it("should read characters from chunks", () => {
      const lexer = new Lexer(new ChunkSource(["de", "", "f fo", "o(1"]));
      const tokens: Token[] = [];
      let tok: Token;
      do {
        tok = lexer.nextToken();
        tokens.push(tok);
      } while (tok.kind !== TokenKind.EOF);
      expect(kinds(tokens)).toEqual([
        TokenKind.DEF,
        TokenKind.IDENT,
        TokenKind.CHAR,
        TokenKind.NUMBER,
        TokenKind.EOF,
      ]);
      expect(tokens[1].literal).toBe("foo");
    });

    it("should report end of input repeatedly", () => {
      const source = new StringSource("a");
      expect(source.read()).toBe("a");
      expect(source.read()).toBe(END_OF_INPUT);
      expect(source.read()).toBe(END_OF_INPUT);
    });
  });

  it("should give the same tokens for the same input", () => {
    const input = "def fib(n) # naive\n  fib(n-1)+fib(n-2);\nfib(10.5)";
    expect(tokenize(input)).toEqual(tokenize(input));
  });
});
