import { describe, expect, test } from 'vitest';
import { FALLBACK_ID, MAX_ID_LENGTH, mintCanonicalId, slugFromQuery, transliterate } from './canonical-id';
import { InMemoryTopicStore } from './topic-store';

const HOUR = 60 * 60 * 1000;

describe('slugFromQuery', () => {
  test.each([
    ['course registration', 'course_registration'],
    ['How do I register for courses?', 'register_courses'],
    ['What are the tuition fees for the engineering faculty?', 'tuition_fees_engineering'],
    ['CS 101 syllabus', 'cs_101_syllabus'],
    ["student's housing", 'student_housing'],
  ])('%s -> %s', (query, slug) => {
    expect(slugFromQuery(query)).toBe(slug);
  });

  test('transliterates Arabic queries', () => {
    expect(slugFromQuery('تسجيل مواد دراسية')).toBe('tsjyl_mwad_drasya');
  });

  test('drops Arabic stop words', () => {
    expect(slugFromQuery('كيف اسجل في الجامعة')).toBe('asjl_aljamaa');
  });

  test('falls back when nothing meaningful is left', () => {
    expect(slugFromQuery('what is the')).toBe(FALLBACK_ID);
    expect(slugFromQuery('?!')).toBe(FALLBACK_ID);
  });

  test('truncates long slugs', () => {
    const slug = slugFromQuery('international scholarship application');
    expect(slug).toBe('international_scholarship_appl');
    expect(slug.length).toBe(MAX_ID_LENGTH);
  });
});

describe('transliterate', () => {
  test('maps Arabic letters and keeps slug characters', () => {
    expect(transliterate('سلام')).toBe('slam');
    expect(transliterate('abc-1_x')).toBe('abc1_x');
  });
});

describe('mintCanonicalId', () => {
  test('uses the bare slug when it is free', async () => {
    expect(await mintCanonicalId('course registration', new InMemoryTopicStore())).toBe('course_registration');
  });

  test('appends a counter while the id is taken', async () => {
    const topics = new InMemoryTopicStore();
    await topics.put('course_registration', { title: 'Registration' }, HOUR);
    expect(await mintCanonicalId('course registration', topics)).toBe('course_registration_2');

    await topics.put('course_registration_2', { title: 'Registration again' }, HOUR);
    expect(await mintCanonicalId('course registration', topics)).toBe('course_registration_3');
  });

  test('never returns the id it was told to avoid', async () => {
    const topics = new InMemoryTopicStore();
    expect(await mintCanonicalId('course registration', topics, 'course_registration')).toBe(
      'course_registration_2'
    );
  });

  test('keeps suffixed ids within the length limit', async () => {
    const topics = new InMemoryTopicStore();
    await topics.put('international_scholarship_appl', { title: 'Scholarships' }, HOUR);

    const id = await mintCanonicalId('international scholarship application', topics);
    expect(id).toBe('international_scholarship_ap_2');
    expect(id.length).toBe(MAX_ID_LENGTH);
  });
});
