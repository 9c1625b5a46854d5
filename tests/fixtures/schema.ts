import type { Field, Model, ThroughRelation } from '../../src/types'

function scalar(
  name: string,
  type: string,
  extra: Partial<Field> = {},
): Field {
  return {
    name,
    dbName: name,
    type,
    isRequired: true,
    isList: false,
    isRelation: false,
    ...extra,
  }
}

function id(): Field {
  return scalar('id', 'Int', { isId: true })
}

function hasMany(name: string, model: string, relationName: string): Field {
  return {
    name,
    dbName: name,
    type: model,
    isRequired: true,
    isList: true,
    isRelation: true,
    relatedModel: model,
    relationName,
  }
}

function belongsTo(
  name: string,
  model: string,
  relationName: string,
  foreignKey: string,
): Field {
  return {
    name,
    dbName: name,
    type: model,
    isRequired: true,
    isList: false,
    isRelation: true,
    relatedModel: model,
    relationName,
    foreignKey: [foreignKey],
    references: ['id'],
    isForeignKeyLocal: true,
  }
}

export const MODELS: Model[] = [
  {
    name: 'User',
    tableName: 'User',
    fields: [
      id(),
      scalar('name', 'String'),
      hasMany('posts', 'Post', 'PostToUser'),
      hasMany('comments', 'Comment', 'CommentToUser'),
      hasMany('tags', 'Tag', 'TagToUser'),
    ],
  },
  {
    name: 'Post',
    tableName: 'Post',
    fields: [
      id(),
      scalar('title', 'String'),
      scalar('published', 'Boolean'),
      scalar('score', 'Int'),
      scalar('userId', 'Int'),
      belongsTo('user', 'User', 'PostToUser', 'userId'),
      hasMany('postCategories', 'PostCategory', 'PostToPostCategory'),
      hasMany('comments', 'Comment', 'CommentToPost'),
    ],
    scopes: {
      published: { published: true },
      minScore: (min) => ({ score: { gte: min } }),
    },
  },
  {
    name: 'Category',
    tableName: 'Category',
    fields: [
      id(),
      scalar('name', 'String'),
      hasMany('postCategories', 'PostCategory', 'CategoryToPostCategory'),
    ],
  },
  {
    name: 'PostCategory',
    tableName: 'PostCategory',
    fields: [
      id(),
      scalar('postId', 'Int'),
      scalar('categoryId', 'Int'),
      belongsTo('post', 'Post', 'PostToPostCategory', 'postId'),
      belongsTo('category', 'Category', 'CategoryToPostCategory', 'categoryId'),
    ],
  },
  {
    name: 'Comment',
    tableName: 'Comment',
    fields: [
      id(),
      scalar('body', 'String'),
      scalar('likes', 'Int'),
      scalar('postId', 'Int'),
      scalar('authorId', 'Int', { isRequired: false }),
      belongsTo('post', 'Post', 'CommentToPost', 'postId'),
      belongsTo('author', 'User', 'CommentToUser', 'authorId'),
    ],
  },
  {
    name: 'Tag',
    tableName: 'Tag',
    fields: [
      id(),
      scalar('label', 'String'),
      hasMany('users', 'User', 'TagToUser'),
    ],
  },
]

export const THROUGH: ThroughRelation[] = [
  { model: 'Post', name: 'categories', through: 'postCategories', source: 'category' },
  { model: 'Category', name: 'posts', through: 'postCategories', source: 'post' },
  { model: 'User', name: 'categories', through: 'posts', source: 'categories' },
  { model: 'User', name: 'postComments', through: 'posts', source: 'comments' },
]
