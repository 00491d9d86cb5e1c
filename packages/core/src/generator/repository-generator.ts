import { renderPhpHeader, type GeneratedPhpClass } from './entity-generator.js';
import { guessOutputPath, guessRepositoryClass, parseClassName } from './naming.js';
import type { Psr4Config } from '../types/config.js';

export interface RepositoryGeneratorOptions {
  /** Fully-qualified entity class name */
  entityClass: string;
  /** Defaults to the sibling Repository namespace */
  repositoryClass?: string;
  psr4?: Psr4Config;
}

/**
 * Emits the Doctrine ServiceEntityRepository paired with a generated entity
 */
export class RepositoryGenerator {
  static generate(options: RepositoryGeneratorOptions): GeneratedPhpClass {
    const entity = parseClassName(options.entityClass);
    const repository = parseClassName(options.repositoryClass ?? guessRepositoryClass(entity));

    const uses = [
      'Doctrine\\Bundle\\DoctrineBundle\\Repository\\ServiceEntityRepository',
      'Doctrine\\Persistence\\ManagerRegistry'
    ];
    if (entity.namespace !== repository.namespace) {
      uses.push(entity.fqcn);
    }

    const lines = [
      ...renderPhpHeader(repository.namespace, uses),
      '/**',
      ` * @extends ServiceEntityRepository<${entity.shortName}>`,
      ' */',
      `class ${repository.shortName} extends ServiceEntityRepository`,
      '{',
      '    public function __construct(ManagerRegistry $registry)',
      '    {',
      `        parent::__construct($registry, ${entity.shortName}::class);`,
      '    }',
      '}',
      ''
    ];

    return {
      className: repository.fqcn,
      path: guessOutputPath(repository, options.psr4),
      source: lines.join('\n')
    };
  }
}
