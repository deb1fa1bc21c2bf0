import { describe, it, expect } from 'vitest';
import { BSON } from 'mongodb';
import { compileQuery, EMPTY_RESULT_STAGE } from '../../src/query/compiler.js';
import { query } from '../../src/query/query-object.js';
import { CompilationError, InvalidRangeError } from '../../src/errors.js';
import { defineModel } from '../../src/model/schema.js';
import type { QuerySpecification } from '../../src/query/types.js';

const employees = defineModel('employees', {
  name: { type: 'string' },
  department: { type: 'string' },
  salary: { type: 'integer' },
  hiredAt: { type: 'datetime', storageName: 'hired_at' },
});

describe('compileQuery: find', () => {
  it('compiles a plain query to find with all options', () => {
    const { artifact, resultModel } = query
      .from(employees)
      .filter([['salary', 'gt', 1000]])
      .orderBy('salary', 'desc')
      .orderBy('name')
      .offset(5)
      .limit(10)
      .select('name', 'salary')
      .compile();

    expect(artifact).toEqual({
      kind: 'find',
      collection: 'employees',
      filter: { salary: { $gt: 1000 } },
      options: {
        projection: { name: 1, salary: 1, _id: 0 },
        sort: { salary: -1, name: 1 },
        skip: 5,
        limit: 10,
      },
    });
    expect(resultModel.fields).toEqual({
      name: { type: 'string', storageName: 'name' },
      salary: { type: 'integer', storageName: 'salary' },
    });
  });

  it('compiles an empty query to an unfiltered find', () => {
    const { artifact, resultModel } = query.from(employees).compile();
    expect(artifact).toEqual({ kind: 'find', collection: 'employees', filter: {}, options: {} });
    expect(resultModel).toBe(employees);
  });

  it('keeps _id when the id field is selected', () => {
    const { artifact } = query.from(employees).select('id', 'name').compile();
    expect(artifact.kind === 'find' && artifact.options.projection).toEqual({ _id: 1, name: 1 });
  });

  it('sorts by storage names', () => {
    const { artifact } = query.from(employees).orderBy('hiredAt', 'desc').compile();
    expect(artifact.kind === 'find' && artifact.options.sort).toEqual({ hired_at: -1 });
  });

  it('emits skip without limit for offset alone', () => {
    const { artifact } = query.from(employees).offset(3).compile();
    expect(artifact).toEqual({ kind: 'find', collection: 'employees', filter: {}, options: { skip: 3 } });
  });

  it('passes hint and batchSize but not allowDiskUse to find', () => {
    const { artifact } = query.from(employees).hint({ salary: -1 }).batchSize(50).allowDiskUse().compile();
    expect(artifact.options).toEqual({ hint: { salary: -1 }, batchSize: 50 });
  });

  it('rejects sorting twice on the same field', () => {
    expect(() => query.from(employees).orderBy('salary').orderBy('salary', 'desc').compile()).toThrow(
      'Field "salary" appears twice in the sort order',
    );
  });

  it('rejects an empty selection', () => {
    expect(() => query.from(employees).select().compile()).toThrow('select() needs at least one field');
  });
});

describe('compileQuery: pipeline', () => {
  it('forces a pipeline that matches nothing for limit(0)', () => {
    const { artifact } = query.from(employees).limit(0).compile();
    expect(artifact).toEqual({
      kind: 'aggregate',
      collection: 'employees',
      pipeline: [{ $match: { $expr: false } }],
      options: {},
    });
    expect(EMPTY_RESULT_STAGE).toEqual({ $match: { $expr: false } });
  });

  it('places base stages before operations in declaration order', () => {
    const { artifact } = query
      .from(employees)
      .filter([['salary', 'gte', 100]])
      .orderBy('name')
      .offset(2)
      .limit(50)
      .groupBy('department')
      .count()
      .end()
      .compile();

    expect(artifact.kind).toBe('aggregate');
    expect(artifact.kind === 'aggregate' && artifact.pipeline).toEqual([
      { $match: { salary: { $gte: 100 } } },
      { $sort: { name: 1 } },
      { $skip: 2 },
      { $limit: 50 },
      { $group: { _id: { department: '$department' }, count: { $sum: 1 } } },
      { $project: { _id: 0, department: '$_id.department', count: 1 } },
    ]);
  });

  it('projects the output model of the last operation', () => {
    const { artifact, resultModel } = query
      .from(employees)
      .groupBy('department')
      .avg('salary', 'avgSalary')
      .end()
      .select('avgSalary')
      .compile();

    expect(artifact.kind === 'aggregate' && artifact.pipeline.at(-1)).toEqual({
      $project: { avgSalary: 1, _id: 0 },
    });
    expect(resultModel.fields).toEqual({ avgSalary: { type: 'float', storageName: 'avgSalary' } });
  });

  it('rejects selecting a field the operations removed', () => {
    const builder = query.from(employees).groupBy('department').count().end().select('salary');
    expect(() => builder.compile()).toThrow(CompilationError);
    expect(() => builder.compile()).toThrow('Unknown field "salary" in "employees"');
  });

  it('passes allowDiskUse, hint and batchSize to aggregate', () => {
    const { artifact } = query
      .from(employees)
      .groupBy('department')
      .count()
      .end()
      .allowDiskUse()
      .hint('department_1')
      .batchSize(10)
      .compile();
    expect(artifact.options).toEqual({ allowDiskUse: true, hint: 'department_1', batchSize: 10 });
  });

  it('compiles the same specification to byte-identical artifacts', () => {
    const spec = query
      .from(employees)
      .filter(['|', ['department', 'eq', 'eng'], ['hiredAt', 'lt', '2020-01-01T00:00:00.000Z']])
      .orderBy('salary', 'desc')
      .window()
      .partitionBy('department')
      .orderBy('salary', 'desc')
      .rowNumber('rank')
      .end()
      .build();

    const first = compileQuery(spec).artifact;
    const second = compileQuery(spec).artifact;
    const bytes = (artifact: typeof first) =>
      BSON.serialize(artifact.kind === 'aggregate' ? { pipeline: artifact.pipeline } : { filter: artifact.filter });
    expect(Buffer.from(bytes(first)).equals(Buffer.from(bytes(second)))).toBe(true);
  });

  it('validates limit and offset of hand-built specifications', () => {
    const spec: QuerySpecification = { ...query.from(employees).build(), limit: -1 };
    expect(() => compileQuery(spec)).toThrow(InvalidRangeError);
  });
});
