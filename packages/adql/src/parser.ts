/**
 * ADQL Parser
 *
 * Builds the query AST from ADQL text using Chevrotain. Parsing stops at the
 * first error; no partial tree is ever returned.
 */

import { CstParser, tokenMatcher } from "chevrotain";
import type { CstNode, IToken, TokenType } from "chevrotain";
import {
  allTokens,
  tokenize,
  // Keywords
  Select,
  Distinct,
  All,
  Top,
  From,
  Where,
  Group,
  By,
  Having,
  Order,
  Asc,
  Desc,
  Offset,
  As,
  And,
  Or,
  Not,
  Is,
  Null,
  True,
  False,
  Between,
  In,
  Like,
  ILike,
  Exists,
  Join,
  Inner,
  Left,
  Right,
  Full,
  Outer,
  Cross,
  Natural,
  On,
  Using,
  Union,
  Intersect,
  Except,
  GeometryKeyword,
  // Identifiers & literals
  Identifier,
  DelimitedIdentifier,
  StringLiteral,
  UnsignedNumber,
  // Operators & punctuation
  ComparisonOperator,
  AdditiveOperator,
  MultiplicativeOperator,
  Concat,
  Star,
  LParen,
  RParen,
  Comma,
  Dot,
} from "./lexer.ts";
import { InternalMorphError, QuerySyntaxError, RecursionLimitError } from "./errors.ts";
import type {
  ArithmeticOperator,
  ComparisonOperator as ComparisonOp,
  Expression,
  FromItem,
  GeometryShape,
  Identifier as IdentifierNode,
  JoinKind,
  Literal,
  OrderItem,
  Query,
  QueryExpression,
  SelectEntry,
  SelectList,
  SourceLocation,
} from "./types.ts";

export const DEFAULT_MAX_NESTING = 64;

// ============================================================================
// CST Parser Definition
// ============================================================================

class AdqlCstParser extends CstParser {
  constructor() {
    super(allTokens, {
      maxLookahead: 3,
      nodeLocationTracking: "full",
    });
    this.performSelfAnalysis();
  }

  public statement = this.RULE("statement", () => {
    this.SUBRULE(this.queryExpression);
  });

  // ==========================================================================
  // Query expressions
  // ==========================================================================

  private queryExpression = this.RULE("queryExpression", () => {
    this.SUBRULE(this.queryTerm);
    this.MANY(() => {
      this.SUBRULE(this.setOperator);
      this.SUBRULE2(this.queryTerm);
    });
    this.OPTION(() => this.SUBRULE(this.orderByClause));
    this.OPTION2(() => this.SUBRULE(this.offsetClause));
  });

  // UNION [ALL] | EXCEPT [ALL]
  private setOperator = this.RULE("setOperator", () => {
    this.OR([{ ALT: () => this.CONSUME(Union) }, { ALT: () => this.CONSUME(Except) }]);
    this.OPTION(() => this.CONSUME(All));
  });

  private queryTerm = this.RULE("queryTerm", () => {
    this.SUBRULE(this.queryPrimary);
    this.MANY(() => {
      this.SUBRULE(this.intersectOperator);
      this.SUBRULE2(this.queryPrimary);
    });
  });

  private intersectOperator = this.RULE("intersectOperator", () => {
    this.CONSUME(Intersect);
    this.OPTION(() => this.CONSUME(All));
  });

  private queryPrimary = this.RULE("queryPrimary", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.querySpecification) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.queryExpression);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  private querySpecification = this.RULE("querySpecification", () => {
    this.CONSUME(Select);
    this.OPTION(() => {
      this.OR([{ ALT: () => this.CONSUME(Distinct) }, { ALT: () => this.CONSUME(All) }]);
    });
    this.OPTION2(() => {
      this.CONSUME(Top);
      this.CONSUME(UnsignedNumber);
    });
    this.SUBRULE(this.selectList);
    this.SUBRULE(this.fromClause);
    this.OPTION3(() => this.SUBRULE(this.whereClause));
    this.OPTION4(() => this.SUBRULE(this.groupByClause));
    this.OPTION5(() => this.SUBRULE(this.havingClause));
  });

  private selectList = this.RULE("selectList", () => {
    this.OR([
      { ALT: () => this.CONSUME(Star) },
      {
        ALT: () => {
          this.SUBRULE(this.selectItem);
          this.MANY(() => {
            this.CONSUME(Comma);
            this.SUBRULE2(this.selectItem);
          });
        },
      },
    ]);
  });

  private selectItem = this.RULE("selectItem", () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          GATE: () => this.isQualifiedStar(),
          ALT: () => this.SUBRULE(this.qualifiedStar),
          IGNORE_AMBIGUITIES: true,
        },
        { ALT: () => this.SUBRULE(this.derivedColumn), IGNORE_AMBIGUITIES: true },
      ],
    });
  });

  // t.*, schema.t.*
  private qualifiedStar = this.RULE("qualifiedStar", () => {
    this.CONSUME(Identifier);
    this.MANY({
      GATE: () => tokenMatcher(this.LA(2), Identifier),
      DEF: () => {
        this.CONSUME(Dot);
        this.CONSUME2(Identifier);
      },
    });
    this.CONSUME2(Dot);
    this.CONSUME(Star);
  });

  private derivedColumn = this.RULE("derivedColumn", () => {
    this.SUBRULE(this.expression);
    this.OPTION(() => {
      this.OPTION2(() => this.CONSUME(As));
      this.CONSUME(Identifier, { LABEL: "alias" });
    });
  });

  // ==========================================================================
  // FROM clause
  // ==========================================================================

  private fromClause = this.RULE("fromClause", () => {
    this.CONSUME(From);
    this.SUBRULE(this.tableReference);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.tableReference);
    });
  });

  private tableReference = this.RULE("tableReference", () => {
    this.SUBRULE(this.tablePrimary);
    this.MANY(() => this.SUBRULE(this.joinTail));
  });

  private tablePrimary = this.RULE("tablePrimary", () => {
    this.OR([
      {
        ALT: () => {
          this.SUBRULE(this.qualifiedName);
          this.OPTION(() => {
            this.OPTION2(() => this.CONSUME(As));
            this.CONSUME(Identifier, { LABEL: "alias" });
          });
        },
      },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.OR2({
            IGNORE_AMBIGUITIES: true,
            DEF: [
              {
                GATE: () => tokenMatcher(this.LA(1), Select),
                ALT: () => this.SUBRULE(this.queryExpression),
                IGNORE_AMBIGUITIES: true,
              },
              { ALT: () => this.SUBRULE(this.tableReference), IGNORE_AMBIGUITIES: true },
            ],
          });
          this.CONSUME(RParen);
          this.OPTION3(() => {
            this.OPTION4(() => this.CONSUME2(As));
            this.CONSUME2(Identifier, { LABEL: "alias" });
          });
        },
      },
    ]);
  });

  private joinTail = this.RULE("joinTail", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Cross);
          this.CONSUME(Join);
          this.SUBRULE(this.tablePrimary);
        },
      },
      {
        ALT: () => {
          this.OPTION(() => this.CONSUME(Natural));
          this.OPTION2(() => this.SUBRULE(this.joinType));
          this.CONSUME2(Join);
          this.SUBRULE2(this.tablePrimary);
          this.OPTION3(() => this.SUBRULE(this.joinSpecification));
        },
      },
    ]);
  });

  private joinType = this.RULE("joinType", () => {
    this.OR([
      { ALT: () => this.CONSUME(Inner) },
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Left) },
            { ALT: () => this.CONSUME(Right) },
            { ALT: () => this.CONSUME(Full) },
          ]);
          this.OPTION(() => this.CONSUME(Outer));
        },
      },
    ]);
  });

  private joinSpecification = this.RULE("joinSpecification", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(On);
          this.SUBRULE(this.expression);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Using);
          this.CONSUME(LParen);
          this.CONSUME(Identifier);
          this.MANY(() => {
            this.CONSUME(Comma);
            this.CONSUME2(Identifier);
          });
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  // ==========================================================================
  // Remaining clauses
  // ==========================================================================

  private whereClause = this.RULE("whereClause", () => {
    this.CONSUME(Where);
    this.SUBRULE(this.expression);
  });

  private groupByClause = this.RULE("groupByClause", () => {
    this.CONSUME(Group);
    this.CONSUME(By);
    this.SUBRULE(this.expression);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.expression);
    });
  });

  private havingClause = this.RULE("havingClause", () => {
    this.CONSUME(Having);
    this.SUBRULE(this.expression);
  });

  private orderByClause = this.RULE("orderByClause", () => {
    this.CONSUME(Order);
    this.CONSUME(By);
    this.SUBRULE(this.orderItem);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.orderItem);
    });
  });

  private orderItem = this.RULE("orderItem", () => {
    this.SUBRULE(this.expression);
    this.OPTION(() => {
      this.OR([{ ALT: () => this.CONSUME(Asc) }, { ALT: () => this.CONSUME(Desc) }]);
    });
  });

  private offsetClause = this.RULE("offsetClause", () => {
    this.CONSUME(Offset);
    this.CONSUME(UnsignedNumber);
  });

  // ==========================================================================
  // Expressions, lowest precedence first
  // ==========================================================================

  private expression = this.RULE("expression", () => {
    this.SUBRULE(this.andExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpression, { LABEL: "operands" });
    });
  });

  private andExpression = this.RULE("andExpression", () => {
    this.SUBRULE(this.notExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpression, { LABEL: "operands" });
    });
  });

  private notExpression = this.RULE("notExpression", () => {
    this.OPTION(() => this.CONSUME(Not));
    this.SUBRULE(this.predicate);
  });

  private predicate = this.RULE("predicate", () => {
    this.SUBRULE(this.concatExpression, { LABEL: "operand" });
    this.OPTION(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(ComparisonOperator);
            this.SUBRULE2(this.concatExpression, { LABEL: "right" });
          },
        },
        {
          ALT: () => {
            this.OPTION2(() => this.CONSUME(Not));
            this.OR2([
              {
                ALT: () => {
                  this.CONSUME(Between);
                  this.SUBRULE3(this.concatExpression, { LABEL: "low" });
                  this.CONSUME(And);
                  this.SUBRULE4(this.concatExpression, { LABEL: "high" });
                },
              },
              {
                ALT: () => {
                  this.CONSUME(In);
                  this.SUBRULE(this.inValue);
                },
              },
              {
                ALT: () => {
                  this.OR3([{ ALT: () => this.CONSUME(Like) }, { ALT: () => this.CONSUME(ILike) }]);
                  this.SUBRULE5(this.concatExpression, { LABEL: "pattern" });
                },
              },
            ]);
          },
        },
        {
          ALT: () => {
            this.CONSUME(Is);
            this.OPTION3(() => this.CONSUME2(Not));
            this.CONSUME(Null);
          },
        },
      ]);
    });
  });

  private inValue = this.RULE("inValue", () => {
    this.CONSUME(LParen);
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          GATE: () => tokenMatcher(this.LA(1), Select),
          ALT: () => this.SUBRULE(this.queryExpression),
          IGNORE_AMBIGUITIES: true,
        },
        {
          IGNORE_AMBIGUITIES: true,
          ALT: () => {
            this.SUBRULE(this.expression, { LABEL: "values" });
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE2(this.expression, { LABEL: "values" });
            });
          },
        },
      ],
    });
    this.CONSUME(RParen);
  });

  private concatExpression = this.RULE("concatExpression", () => {
    this.SUBRULE(this.additiveExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Concat);
      this.SUBRULE2(this.additiveExpression, { LABEL: "operands" });
    });
  });

  private additiveExpression = this.RULE("additiveExpression", () => {
    this.SUBRULE(this.multiplicativeExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(AdditiveOperator);
      this.SUBRULE2(this.multiplicativeExpression, { LABEL: "operands" });
    });
  });

  private multiplicativeExpression = this.RULE("multiplicativeExpression", () => {
    this.SUBRULE(this.unaryExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(MultiplicativeOperator);
      this.SUBRULE2(this.unaryExpression, { LABEL: "operands" });
    });
  });

  private unaryExpression = this.RULE("unaryExpression", () => {
    this.OPTION(() => this.CONSUME(AdditiveOperator, { LABEL: "sign" }));
    this.SUBRULE(this.primary);
  });

  private primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(UnsignedNumber) },
      { ALT: () => this.SUBRULE(this.stringLiteral) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
      { ALT: () => this.SUBRULE(this.existsPredicate) },
      { ALT: () => this.SUBRULE(this.geometryConstructor) },
      { ALT: () => this.SUBRULE(this.functionCall) },
      { ALT: () => this.SUBRULE(this.qualifiedName) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  // Adjacent literals concatenate: 'a' 'b' is 'ab'
  private stringLiteral = this.RULE("stringLiteral", () => {
    this.AT_LEAST_ONE(() => this.CONSUME(StringLiteral));
  });

  private existsPredicate = this.RULE("existsPredicate", () => {
    this.CONSUME(Exists);
    this.CONSUME(LParen);
    this.SUBRULE(this.queryExpression);
    this.CONSUME(RParen);
  });

  // POINT('ICRS', ra, dec), CIRCLE(ra, dec, r), REGION('Circle ICRS 1 2 3')
  private geometryConstructor = this.RULE("geometryConstructor", () => {
    this.CONSUME(GeometryKeyword);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression, { LABEL: "args" });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.expression, { LABEL: "args" });
    });
    this.CONSUME(RParen);
  });

  private functionCall = this.RULE("functionCall", () => {
    this.CONSUME(Identifier);
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star) },
        {
          ALT: () => {
            this.OPTION2(() => {
              this.OR2([{ ALT: () => this.CONSUME(Distinct) }, { ALT: () => this.CONSUME(All) }]);
            });
            this.SUBRULE(this.expression, { LABEL: "args" });
            this.MANY(() => {
              this.CONSUME(Comma);
              this.SUBRULE2(this.expression, { LABEL: "args" });
            });
          },
        },
      ]);
    });
    this.CONSUME(RParen);
  });

  private qualifiedName = this.RULE("qualifiedName", () => {
    this.CONSUME(Identifier);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Identifier);
    });
  });

  private isQualifiedStar(): boolean {
    let k = 1;
    while (tokenMatcher(this.LA(k), Identifier) && tokenMatcher(this.LA(k + 1), Dot)) {
      k += 2;
    }
    return k > 1 && tokenMatcher(this.LA(k), Star);
  }
}

// ============================================================================
// CST to AST Visitor
// ============================================================================

const parserInstance = new AdqlCstParser();

function isToken(element: CstNode | IToken): element is IToken {
  return "image" in element;
}

function extractTokens(node: CstNode, tokenType: string): IToken[] {
  const tokens = node.children[tokenType];
  if (!tokens) return [];
  return tokens.filter(isToken);
}

function extractToken(node: CstNode, tokenType: string): IToken | undefined {
  return extractTokens(node, tokenType)[0];
}

function extractChild(node: CstNode, childName: string): CstNode | undefined {
  return extractChildren(node, childName)[0];
}

function extractChildren(node: CstNode, childName: string): CstNode[] {
  const children = node.children[childName];
  if (!children) return [];
  return children.filter((c): c is CstNode => "children" in c);
}

function requireChild(node: CstNode, childName: string): CstNode {
  const child = extractChild(node, childName);
  if (!child) {
    throw new InternalMorphError(`Malformed syntax tree: '${node.name}' has no '${childName}'`);
  }
  return child;
}

function requireToken(node: CstNode, tokenType: string): IToken {
  const token = extractToken(node, tokenType);
  if (!token) {
    throw new InternalMorphError(`Malformed syntax tree: '${node.name}' has no '${tokenType}'`);
  }
  return token;
}

function tokenLocation(token: IToken): SourceLocation {
  return {
    start: { line: token.startLine ?? 1, column: token.startColumn ?? 1, offset: token.startOffset },
    end: {
      line: token.endLine ?? token.startLine ?? 1,
      column: token.endColumn ?? token.startColumn ?? 1,
      offset: token.endOffset ?? token.startOffset,
    },
  };
}

function nodeLocation(node: CstNode): SourceLocation | undefined {
  const loc = node.location;
  if (!loc || Number.isNaN(loc.startOffset)) return undefined;
  return {
    start: { line: loc.startLine ?? 1, column: loc.startColumn ?? 1, offset: loc.startOffset },
    end: {
      line: loc.endLine ?? loc.startLine ?? 1,
      column: loc.endColumn ?? loc.startColumn ?? 1,
      offset: loc.endOffset ?? loc.startOffset,
    },
  };
}

function toIdentifier(token: IToken): IdentifierNode {
  if (tokenMatcher(token, DelimitedIdentifier)) {
    return { name: token.image.slice(1, -1).replace(/""/g, '"'), quoted: true };
  }
  return { name: token.image, quoted: false };
}

function syntaxErrorAt(token: IToken, message: string): QuerySyntaxError {
  return new QuerySyntaxError(message, [], { location: tokenLocation(token), token: token.image });
}

function parseCount(token: IToken, clause: string): number {
  if (!/^\d+$/.test(token.image)) {
    throw syntaxErrorAt(token, `${clause} expects an unsigned integer, found '${token.image}'`);
  }
  const value = Number(token.image);
  if (!Number.isSafeInteger(value)) {
    throw syntaxErrorAt(token, `${clause} value ${token.image} is too large`);
  }
  return value;
}

class CstToAstVisitor {
  visit(cst: CstNode): QueryExpression {
    return this.visitQueryExpression(requireChild(cst, "queryExpression"));
  }

  // ==========================================================================
  // Query expressions
  // ==========================================================================

  private visitQueryExpression(node: CstNode): QueryExpression {
    const terms = extractChildren(node, "queryTerm");
    const operators = extractChildren(node, "setOperator");
    let result = this.visitQueryTerm(requireChild(node, "queryTerm"));

    operators.forEach((operator, i) => {
      const right = terms[i + 1];
      if (!right) return;
      result = {
        type: "SetOp",
        op: extractToken(operator, "Union") ? "UNION" : "EXCEPT",
        all: extractToken(operator, "All") !== undefined,
        left: result,
        right: this.visitQueryTerm(right),
        orderBy: [],
        location: nodeLocation(node),
      };
    });

    const orderByNode = extractChild(node, "orderByClause");
    const offsetNode = extractChild(node, "offsetClause");
    if (!orderByNode && !offsetNode) return result;

    if (result.orderBy.length > 0 || result.offset !== undefined) {
      const token = requireToken(orderByNode ?? requireChild(node, "offsetClause"), orderByNode ? "Order" : "Offset");
      throw syntaxErrorAt(token, "ORDER BY and OFFSET may only be given once per query");
    }

    const orderBy = orderByNode
      ? extractChildren(orderByNode, "orderItem").map((item) => this.visitOrderItem(item))
      : [];
    const offset = offsetNode ? parseCount(requireToken(offsetNode, "UnsignedNumber"), "OFFSET") : undefined;

    return offset === undefined ? { ...result, orderBy } : { ...result, orderBy, offset };
  }

  private visitQueryTerm(node: CstNode): QueryExpression {
    const primaries = extractChildren(node, "queryPrimary");
    const operators = extractChildren(node, "intersectOperator");
    let result = this.visitQueryPrimary(requireChild(node, "queryPrimary"));

    operators.forEach((operator, i) => {
      const right = primaries[i + 1];
      if (!right) return;
      result = {
        type: "SetOp",
        op: "INTERSECT",
        all: extractToken(operator, "All") !== undefined,
        left: result,
        right: this.visitQueryPrimary(right),
        orderBy: [],
        location: nodeLocation(node),
      };
    });

    return result;
  }

  private visitQueryPrimary(node: CstNode): QueryExpression {
    const spec = extractChild(node, "querySpecification");
    if (spec) return this.visitQuerySpecification(spec);
    return this.visitQueryExpression(requireChild(node, "queryExpression"));
  }

  private visitQuerySpecification(node: CstNode): Query {
    const query: Query = {
      type: "Query",
      distinct: extractToken(node, "Distinct") !== undefined,
      select: this.visitSelectList(requireChild(node, "selectList")),
      from: extractChildren(requireChild(node, "fromClause"), "tableReference").map((ref) =>
        this.visitTableReference(ref)
      ),
      groupBy: [],
      orderBy: [],
      location: nodeLocation(node),
    };

    const topToken = extractToken(node, "UnsignedNumber");
    if (topToken) {
      query.top = parseCount(topToken, "TOP");
    }

    const whereNode = extractChild(node, "whereClause");
    if (whereNode) {
      query.where = this.visitExpression(requireChild(whereNode, "expression"));
    }

    const groupByNode = extractChild(node, "groupByClause");
    if (groupByNode) {
      query.groupBy = extractChildren(groupByNode, "expression").map((e) => this.visitExpression(e));
    }

    const havingNode = extractChild(node, "havingClause");
    if (havingNode) {
      query.having = this.visitExpression(requireChild(havingNode, "expression"));
    }

    return query;
  }

  private visitSelectList(node: CstNode): SelectList {
    const star = extractToken(node, "Star");
    const items: SelectEntry[] = star
      ? [{ type: "SelectStar", location: tokenLocation(star) }]
      : extractChildren(node, "selectItem").map((item) => this.visitSelectItem(item));
    return { type: "SelectList", items, location: nodeLocation(node) };
  }

  private visitSelectItem(node: CstNode): SelectEntry {
    const qualifiedStar = extractChild(node, "qualifiedStar");
    if (qualifiedStar) {
      return {
        type: "SelectStar",
        qualifier: extractTokens(qualifiedStar, "Identifier").map(toIdentifier),
        location: nodeLocation(qualifiedStar),
      };
    }

    const column = requireChild(node, "derivedColumn");
    const aliasToken = extractToken(column, "alias");
    const expr = this.visitExpression(requireChild(column, "expression"));
    return aliasToken
      ? { type: "SelectItem", expr, alias: toIdentifier(aliasToken), location: nodeLocation(node) }
      : { type: "SelectItem", expr, location: nodeLocation(node) };
  }

  private visitOrderItem(node: CstNode): OrderItem {
    return {
      type: "OrderItem",
      expr: this.visitExpression(requireChild(node, "expression")),
      descending: extractToken(node, "Desc") !== undefined,
      location: nodeLocation(node),
    };
  }

  // ==========================================================================
  // FROM clause
  // ==========================================================================

  private visitTableReference(node: CstNode): FromItem {
    let result = this.visitTablePrimary(requireChild(node, "tablePrimary"));
    for (const tail of extractChildren(node, "joinTail")) {
      result = this.visitJoinTail(tail, result);
    }
    return result;
  }

  private visitTablePrimary(node: CstNode): FromItem {
    const aliasToken = extractToken(node, "alias");
    const alias = aliasToken ? toIdentifier(aliasToken) : undefined;

    const name = extractChild(node, "qualifiedName");
    if (name) {
      const ref: FromItem = {
        type: "TableRef",
        name: extractTokens(name, "Identifier").map(toIdentifier),
        location: nodeLocation(node),
      };
      return alias ? { ...ref, alias } : ref;
    }

    const subquery = extractChild(node, "queryExpression");
    if (subquery) {
      if (!alias) {
        throw syntaxErrorAt(requireToken(node, "RParen"), "A subquery in FROM needs an alias");
      }
      return {
        type: "DerivedTable",
        query: this.visitQueryExpression(subquery),
        alias,
        location: nodeLocation(node),
      };
    }

    if (aliasToken) {
      throw syntaxErrorAt(aliasToken, "A parenthesized join cannot be aliased");
    }
    return this.visitTableReference(requireChild(node, "tableReference"));
  }

  private visitJoinTail(node: CstNode, left: FromItem): FromItem {
    const right = this.visitTablePrimary(requireChild(node, "tablePrimary"));
    const location = nodeLocation(node);

    if (extractToken(node, "Cross")) {
      return { type: "Join", kind: "CROSS", natural: false, left, right, location };
    }

    const natural = extractToken(node, "Natural") !== undefined;
    const typeNode = extractChild(node, "joinType");
    let kind: JoinKind = "INNER";
    if (typeNode) {
      if (extractToken(typeNode, "Left")) kind = "LEFT";
      else if (extractToken(typeNode, "Right")) kind = "RIGHT";
      else if (extractToken(typeNode, "Full")) kind = "FULL";
    }

    const spec = extractChild(node, "joinSpecification");
    const joinToken = requireToken(node, "Join");
    if (natural && spec) {
      throw syntaxErrorAt(joinToken, "A NATURAL join takes neither ON nor USING");
    }
    if (!natural && !spec) {
      throw syntaxErrorAt(joinToken, "JOIN requires ON or USING");
    }
    if (!spec) {
      return { type: "Join", kind, natural, left, right, location };
    }

    const condition = extractChild(spec, "expression");
    if (condition) {
      return { type: "Join", kind, natural, left, right, on: this.visitExpression(condition), location };
    }
    const using = extractTokens(spec, "Identifier").map(toIdentifier);
    return { type: "Join", kind, natural, left, right, using, location };
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private visitExpression(node: CstNode): Expression {
    const operands = extractChildren(node, "operands").map((n) => this.visitAndExpression(n));
    return this.foldLogical(operands, "OR");
  }

  private visitAndExpression(node: CstNode): Expression {
    const operands = extractChildren(node, "operands").map((n) => this.visitNotExpression(n));
    return this.foldLogical(operands, "AND");
  }

  /** AND and OR associate, so long chains fold into a balanced tree. */
  private foldLogical(operands: Expression[], op: "AND" | "OR"): Expression {
    const [first] = operands;
    if (!first) {
      throw new InternalMorphError(`Malformed syntax tree: empty ${op} expression`);
    }
    if (operands.length === 1) return first;
    const middle = Math.ceil(operands.length / 2);
    const left = this.foldLogical(operands.slice(0, middle), op);
    const right = this.foldLogical(operands.slice(middle), op);
    return { type: "BinaryExpr", op, left, right, location: span(left, right) };
  }

  private visitNotExpression(node: CstNode): Expression {
    const operand = this.visitPredicate(requireChild(node, "predicate"));
    const not = extractToken(node, "Not");
    if (!not) return operand;
    return { type: "UnaryExpr", op: "NOT", operand, location: nodeLocation(node) };
  }

  private visitPredicate(node: CstNode): Expression {
    const operand = this.visitConcat(requireChild(node, "operand"));
    const location = nodeLocation(node);
    const negated = extractToken(node, "Not") !== undefined;

    const comparison = extractToken(node, "ComparisonOperator");
    if (comparison) {
      const op: ComparisonOp = comparison.image === "!=" ? "<>" : toComparisonOperator(comparison);
      const right = this.visitConcat(requireChild(node, "right"));
      return { type: "Comparison", op, left: operand, right, location };
    }

    if (extractToken(node, "Between")) {
      return {
        type: "Between",
        negated,
        operand,
        low: this.visitConcat(requireChild(node, "low")),
        high: this.visitConcat(requireChild(node, "high")),
        location,
      };
    }

    const inValue = extractChild(node, "inValue");
    if (inValue) {
      const subquery = extractChild(inValue, "queryExpression");
      if (subquery) {
        return {
          type: "InList",
          negated,
          operand,
          values: [],
          subquery: this.visitQueryExpression(subquery),
          location,
        };
      }
      const values = extractChildren(inValue, "values").map((v) => this.visitExpression(v));
      return { type: "InList", negated, operand, values, location };
    }

    if (extractToken(node, "Like") || extractToken(node, "Ilike")) {
      return {
        type: "LikePattern",
        negated,
        caseInsensitive: extractToken(node, "Ilike") !== undefined,
        operand,
        pattern: this.visitConcat(requireChild(node, "pattern")),
        location,
      };
    }

    if (extractToken(node, "Is")) {
      return { type: "NullCheck", negated, operand, location };
    }

    return operand;
  }

  private visitConcat(node: CstNode): Expression {
    const operands = extractChildren(node, "operands").map((n) => this.visitAdditive(n));
    return this.foldArithmetic(operands, extractTokens(node, "Concat"));
  }

  private visitAdditive(node: CstNode): Expression {
    const operands = extractChildren(node, "operands").map((n) => this.visitMultiplicative(n));
    return this.foldArithmetic(operands, extractTokens(node, "AdditiveOperator"));
  }

  private visitMultiplicative(node: CstNode): Expression {
    const operands = extractChildren(node, "operands").map((n) => this.visitUnary(n));
    return this.foldArithmetic(operands, extractTokens(node, "MultiplicativeOperator"));
  }

  private foldArithmetic(operands: Expression[], operators: IToken[]): Expression {
    const [first, ...rest] = operands;
    if (!first) {
      throw new InternalMorphError("Malformed syntax tree: empty arithmetic expression");
    }
    return rest.reduce<Expression>((left, right, i) => {
      const token = operators[i];
      if (!token) {
        throw new InternalMorphError("Malformed syntax tree: operator missing");
      }
      return {
        type: "BinaryExpr",
        op: toArithmeticOperator(token),
        left,
        right,
        location: span(left, right),
      };
    }, first);
  }

  private visitUnary(node: CstNode): Expression {
    const operand = this.visitPrimary(requireChild(node, "primary"));
    const sign = extractToken(node, "sign");
    if (!sign) return operand;
    return {
      type: "UnaryExpr",
      op: sign.image === "-" ? "-" : "+",
      operand,
      location: nodeLocation(node),
    };
  }

  private visitPrimary(node: CstNode): Expression {
    const numberToken = extractToken(node, "UnsignedNumber");
    if (numberToken) return numberLiteral(numberToken);

    const stringNode = extractChild(node, "stringLiteral");
    if (stringNode) return stringLiteral(stringNode);

    const trueToken = extractToken(node, "True");
    if (trueToken) {
      return { type: "Literal", kind: "boolean", value: true, raw: "TRUE", location: tokenLocation(trueToken) };
    }
    const falseToken = extractToken(node, "False");
    if (falseToken) {
      return { type: "Literal", kind: "boolean", value: false, raw: "FALSE", location: tokenLocation(falseToken) };
    }
    const nullToken = extractToken(node, "Null");
    if (nullToken) {
      return { type: "Literal", kind: "null", value: null, raw: "NULL", location: tokenLocation(nullToken) };
    }

    const exists = extractChild(node, "existsPredicate");
    if (exists) {
      return {
        type: "Exists",
        subquery: this.visitQueryExpression(requireChild(exists, "queryExpression")),
        location: nodeLocation(exists),
      };
    }

    const geometry = extractChild(node, "geometryConstructor");
    if (geometry) return this.visitGeometry(geometry);

    const call = extractChild(node, "functionCall");
    if (call) return this.visitFunctionCall(call);

    const name = extractChild(node, "qualifiedName");
    if (name) {
      const parts = extractTokens(name, "Identifier").map(toIdentifier);
      const column = parts.pop();
      if (!column) {
        throw new InternalMorphError("Malformed syntax tree: empty column reference");
      }
      const location = nodeLocation(name);
      return parts.length > 0
        ? { type: "ColumnRef", qualifier: parts, name: column, location }
        : { type: "ColumnRef", name: column, location };
    }

    return this.visitExpression(requireChild(node, "expression"));
  }

  private visitGeometry(node: CstNode): Expression {
    const keyword = requireToken(node, "GeometryKeyword");
    const shape = toGeometryShape(keyword);
    const args = extractChildren(node, "args").map((a) => this.visitExpression(a));
    const location = nodeLocation(node);

    const [first, ...rest] = args;
    if (shape !== "REGION" && first?.type === "Literal" && first.kind === "string") {
      return { type: "GeometryLiteral", shape, coordSys: first.value, args: rest, location };
    }
    return { type: "GeometryLiteral", shape, args, location };
  }

  private visitFunctionCall(node: CstNode): Expression {
    const name = toIdentifier(requireToken(node, "Identifier")).name;
    const args = extractChildren(node, "args").map((a) => this.visitExpression(a));
    const location = nodeLocation(node);
    const star = extractToken(node, "Star") !== undefined;

    if (extractToken(node, "Distinct")) {
      return { type: "FunctionCall", name, args, star, quantifier: "DISTINCT", location };
    }
    if (extractToken(node, "All")) {
      return { type: "FunctionCall", name, args, star, quantifier: "ALL", location };
    }
    return { type: "FunctionCall", name, args, star, location };
  }
}

function span(left: Expression, right: Expression): SourceLocation | undefined {
  if (!left.location || !right.location) return left.location ?? right.location;
  return { start: left.location.start, end: right.location.end };
}

function toComparisonOperator(token: IToken): ComparisonOp {
  switch (token.image) {
    case "=":
    case "<>":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return token.image;
    default:
      throw syntaxErrorAt(token, `Unknown comparison operator '${token.image}'`);
  }
}

function toArithmeticOperator(token: IToken): ArithmeticOperator {
  switch (token.image) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "||":
      return token.image;
    default:
      throw syntaxErrorAt(token, `Unknown operator '${token.image}'`);
  }
}

function toGeometryShape(token: IToken): GeometryShape {
  const shape = token.image.toUpperCase();
  switch (shape) {
    case "POINT":
    case "CIRCLE":
    case "BOX":
    case "POLYGON":
    case "REGION":
      return shape;
    default:
      throw syntaxErrorAt(token, `Unknown geometry constructor '${token.image}'`);
  }
}

function numberLiteral(token: IToken): Literal {
  const raw = token.image;
  const location = tokenLocation(token);
  if (/^\d+$/.test(raw)) {
    const value = Number(raw);
    if (Number.isSafeInteger(value)) {
      return { type: "Literal", kind: "integer", value, raw, location };
    }
    return { type: "Literal", kind: "bigint", value: BigInt(raw), raw, location };
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw syntaxErrorAt(token, `Number ${raw} is out of range`);
  }
  return { type: "Literal", kind: "double", value, raw, location };
}

function stringLiteral(node: CstNode): Literal {
  const tokens = extractTokens(node, "StringLiteral");
  const value = tokens.map((t) => t.image.slice(1, -1).replace(/''/g, "'")).join("");
  const first = tokens[0];
  const location = first ? tokenLocation(first) : undefined;
  return { type: "Literal", kind: "string", value, raw: `'${value.replace(/'/g, "''")}'`, location };
}

// ============================================================================
// Error Reporting
// ============================================================================

function describeTokenType(tokenType: TokenType): string {
  return tokenType.LABEL ?? tokenType.name;
}

function endOfInput(source: string): SourceLocation {
  const lines = source.split("\n");
  const last = lines[lines.length - 1] ?? "";
  const position = { line: lines.length, column: last.length + 1, offset: source.length };
  return { start: position, end: position };
}

function expectedAfter(preceding: IToken[]): string[] {
  const paths = parserInstance.computeContentAssist("statement", preceding);
  const names = new Set(paths.map((path) => describeTokenType(path.nextTokenType)));
  return [...names].sort();
}

// Chevrotain recurses several frames per parenthesis; refuse deep nesting
// before handing the tokens over.
function checkNesting(tokens: IToken[], maxNesting: number): void {
  let depth = 0;
  for (const token of tokens) {
    if (tokenMatcher(token, LParen)) {
      depth++;
      if (depth > maxNesting) {
        throw new RecursionLimitError(`Parentheses nested deeper than ${maxNesting} levels`, {
          location: tokenLocation(token),
          token: token.image,
        });
      }
    } else if (tokenMatcher(token, RParen)) {
      depth = Math.max(0, depth - 1);
    }
  }
}

export interface ParseOptions {
  maxNesting?: number;
}

/**
 * Parse ADQL text into a query expression.
 *
 * @throws QuerySyntaxError on the first lexical or syntactic error
 * @throws RecursionLimitError when parentheses nest deeper than `maxNesting`
 */
export function parse(source: string, options: ParseOptions = {}): QueryExpression {
  const lexResult = tokenize(source);

  const lexError = lexResult.errors[0];
  if (lexError) {
    const position = {
      line: lexError.line ?? 1,
      column: lexError.column ?? 1,
      offset: lexError.offset,
    };
    throw new QuerySyntaxError(
      `Unexpected character '${source.charAt(lexError.offset)}'`,
      [],
      { location: { start: position, end: position }, token: source.slice(lexError.offset, lexError.offset + lexError.length) }
    );
  }

  checkNesting(lexResult.tokens, options.maxNesting ?? DEFAULT_MAX_NESTING);

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.statement();

  const parseError = parserInstance.errors[0];
  if (parseError) {
    const token = parseError.token;
    const atEnd = Number.isNaN(token.startOffset);
    const index = atEnd ? lexResult.tokens.length : lexResult.tokens.indexOf(token);
    const expected = expectedAfter(lexResult.tokens.slice(0, index < 0 ? 0 : index));
    const found = atEnd ? "end of input" : `'${token.image}'`;
    const message =
      expected.length > 0
        ? `Unexpected ${found}; expected one of ${expected.join(", ")}`
        : `Unexpected ${found}`;
    throw new QuerySyntaxError(message, expected, {
      location: atEnd ? endOfInput(source) : tokenLocation(token),
      token: atEnd ? "" : token.image,
    });
  }

  const visitor = new CstToAstVisitor();
  return visitor.visit(cst);
}
