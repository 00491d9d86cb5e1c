import { describe, expect, it } from 'vitest';
import { RepositoryGenerator } from './repository-generator.js';

describe('RepositoryGenerator', () => {
  it('should emit a ServiceEntityRepository for the entity', () => {
    const generated = RepositoryGenerator.generate({ entityClass: 'App\\Entity\\Movie' });

    expect(generated.className).toBe('App\\Repository\\MovieRepository');
    expect(generated.path).toBe('src/Repository/MovieRepository.php');
    expect(generated.source).toBe(
      [
        '<?php',
        '',
        'declare(strict_types=1);',
        '',
        'namespace App\\Repository;',
        '',
        'use App\\Entity\\Movie;',
        'use Doctrine\\Bundle\\DoctrineBundle\\Repository\\ServiceEntityRepository;',
        'use Doctrine\\Persistence\\ManagerRegistry;',
        '',
        '/**',
        ' * @extends ServiceEntityRepository<Movie>',
        ' */',
        'class MovieRepository extends ServiceEntityRepository',
        '{',
        '    public function __construct(ManagerRegistry $registry)',
        '    {',
        '        parent::__construct($registry, Movie::class);',
        '    }',
        '}',
        ''
      ].join('\n')
    );
  });

  it('should not import an entity from its own namespace', () => {
    const generated = RepositoryGenerator.generate({
      entityClass: 'Shop\\Catalog\\Item',
      repositoryClass: 'Shop\\Catalog\\ItemRepository',
      psr4: { prefix: 'Shop\\', dir: 'src' }
    });

    expect(generated.path).toBe('src/Catalog/ItemRepository.php');
    expect(generated.source.split('\n').filter(line => line.startsWith('use '))).toEqual([
      'use Doctrine\\Bundle\\DoctrineBundle\\Repository\\ServiceEntityRepository;',
      'use Doctrine\\Persistence\\ManagerRegistry;'
    ]);
  });
});
