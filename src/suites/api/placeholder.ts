import { defineSuite } from '@core/harness/suite.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import {
  albumSchema,
  commentSchema,
  photoSchema,
  postEchoSchema,
  postSchema,
  userSchema,
} from '@/schemas/placeholder.ts';
import { expect } from 'chai';
import { z } from 'zod';

/**
 * CRUD and relationship checks against the placeholder REST API
 */
export const placeholderSuite = defineSuite<HarnessFixtures>(
  { name: 'placeholder api', category: 'api', file: 'src/suites/api/placeholder.ts' },
  (s) => {
    s.test(
      'get all users',
      ['http'],
      async ({ http }) => {
        const response = await http.get('/users');
        expect(response.status).to.equal(200);

        const users = response.parse(z.array(userSchema));
        expect(users).to.not.be.empty;
        expect(users).to.have.lengthOf(10);
      },
      { tags: ['smoke'] }
    );

    s.test('get user by id', ['http'], async ({ http }) => {
      const response = await http.get('/users/1');
      expect(response.status).to.equal(200);

      const user = response.parse(userSchema);
      expect(user.id).to.equal(1);
      expect(user.email).to.include('@');
    });

    s.test('unknown user returns 404 and an empty object', ['http'], async ({ http }) => {
      const response = await http.get('/users/999');

      expect(response.status).to.equal(404);
      expect(response.json()).to.deep.equal({});
    });

    s.each(
      [1, 2, 5, 10],
      (postId) => `get post ${postId}`,
      ['http'],
      async ({ http }, postId) => {
        const response = await http.get(`/posts/${postId}`);
        expect(response.status).to.equal(200);
        expect(response.parse(postSchema).id).to.equal(postId);
      }
    );

    s.test('get posts by user', ['http'], async ({ http }) => {
      const response = await http.get('/posts', { params: { userId: 1 } });
      expect(response.status).to.equal(200);

      const posts = response.parse(z.array(postSchema));
      expect(posts).to.not.be.empty;
      for (const post of posts) {
        expect(post.userId).to.equal(1);
      }
    });

    s.test(
      'create post',
      ['http'],
      async ({ http }) => {
        const newPost = { title: 'Test Post', body: 'This is a test post body', userId: 1 };

        const response = await http.post('/posts', newPost);
        expect(response.status).to.equal(201);

        const created = response.parse(postEchoSchema);
        expect(created).to.include(newPost);
        expect(created).to.have.property('id');
      },
      { tags: ['smoke'] }
    );

    s.test('create post with invalid data is still accepted', ['http'], async ({ http }) => {
      const response = await http.post('/posts', { title: '', body: '', userId: 'not_a_number' });
      expect(response.status).to.equal(201);
    });

    s.test(
      'create post from generated data',
      ['http', 'sampleProduct'],
      async ({ http, sampleProduct }) => {
        const response = await http.post('/posts', {
          title: sampleProduct.title,
          body: sampleProduct.description,
          userId: 1,
        });

        expect(response.status).to.equal(201);
        expect(response.parse(postEchoSchema).title).to.equal(sampleProduct.title);
      }
    );

    s.test('update post', ['http'], async ({ http }) => {
      const update = { id: 1, title: 'Updated Title', body: 'Updated body content', userId: 1 };

      const response = await http.put('/posts/1', update);
      expect(response.status).to.equal(200);

      const updated = response.parse(postEchoSchema);
      expect(updated.title).to.equal(update.title);
      expect(updated.body).to.equal(update.body);
    });

    s.test('partially update post', ['http'], async ({ http }) => {
      const response = await http.patch('/posts/1', { title: 'Only Title Updated' });
      expect(response.status).to.equal(200);

      const patched = response.parse(postEchoSchema);
      expect(patched.title).to.equal('Only Title Updated');
      expect(patched).to.have.property('body');
    });

    s.test('delete post', ['http'], async ({ http }) => {
      const response = await http.delete('/posts/1');

      expect(response.status).to.equal(200);
      expect(response.json()).to.deep.equal({});
    });

    s.test('session fixture sends default JSON headers', ['http'], async ({ http }) => {
      expect(http.defaultHeaders).to.include({ Accept: 'application/json' });

      const response = await http.request('GET', '/users/1');
      expect(response.status).to.equal(200);
      expect(response.parse(userSchema).id).to.equal(1);
    });

    s.test(
      'response time',
      ['http'],
      async ({ http }) => {
        const response = await http.get('/users');

        expect(response.status).to.equal(200);
        expect(response.elapsedMs).to.be.below(2000);
      },
      { tags: ['slow'] }
    );

    s.test('user posts relationship', ['http'], async ({ http }) => {
      const user = (await http.get('/users/1')).parse(userSchema);

      const response = await http.get('/posts', { params: { userId: user.id } });
      expect(response.status).to.equal(200);

      const posts = response.parse(z.array(postSchema));
      expect(posts).to.not.be.empty;
      expect(posts.every((post) => post.userId === user.id)).to.equal(true);
    });

    s.test('comments for post', ['http'], async ({ http }) => {
      const response = await http.get('/posts/1/comments');
      expect(response.status).to.equal(200);

      const comments = response.parse(z.array(commentSchema));
      expect(comments).to.not.be.empty;
      for (const comment of comments) {
        expect(comment.postId).to.equal(1);
        expect(comment.email).to.include('@');
      }
    });

    s.test('filter comments by email', ['http'], async ({ http }) => {
      const [first] = (await http.get('/posts/1/comments')).parse(z.array(commentSchema));
      expect(first, 'post 1 has comments').to.not.equal(undefined);
      const email = first?.email ?? '';

      const response = await http.get('/comments', { params: { email } });
      expect(response.status).to.equal(200);

      const comments = response.parse(z.array(commentSchema));
      expect(comments).to.not.be.empty;
      for (const comment of comments) {
        expect(comment.email).to.equal(email);
      }
    });

    s.test('user albums photos chain', ['http'], async ({ http }) => {
      const albumsResponse = await http.get('/albums', { params: { userId: 1 } });
      expect(albumsResponse.status).to.equal(200);

      const [album] = albumsResponse.parse(z.array(albumSchema));
      if (!album) {
        throw new Error('user 1 has no albums');
      }

      const photosResponse = await http.get('/photos', { params: { albumId: album.id } });
      expect(photosResponse.status).to.equal(200);

      const photos = photosResponse.parse(z.array(photoSchema));
      expect(photos).to.not.be.empty;
      for (const photo of photos) {
        expect(photo.albumId).to.equal(album.id);
        expect(photo.url).to.match(/^https:\/\//);
        expect(photo.thumbnailUrl).to.match(/^https:\/\//);
      }
    });
  }
);
