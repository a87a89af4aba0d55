// Builders for upstream payload shapes used across the client tests.

export function rawUser(id: string, screenName: string, overrides: Record<string, unknown> = {}) {
  return {
    __typename: 'User',
    rest_id: id,
    is_blue_verified: false,
    core: { screen_name: screenName, name: `Name ${screenName}`, created_at: 'Mon Jan 01 00:00:00 +0000 2018' },
    legacy: {
      description: `Bio of ${screenName}`,
      followers_count: 1200,
      friends_count: 80,
      statuses_count: 512,
    },
    ...overrides,
  };
}

export function rawTweet(id: string, overrides: Record<string, unknown> = {}) {
  return {
    __typename: 'Tweet',
    rest_id: id,
    core: { user_results: { result: rawUser('42', 'author') } },
    views: { count: '9001' },
    legacy: {
      full_text: `Tweet ${id}`,
      created_at: 'Tue Oct 01 12:00:00 +0000 2024',
      conversation_id_str: id,
      lang: 'en',
      reply_count: 3,
      retweet_count: 5,
      favorite_count: 21,
      quote_count: 2,
      bookmark_count: 7,
    },
    ...overrides,
  };
}

export function legacyUser(id: string, screenName: string) {
  return {
    id_str: id,
    screen_name: screenName,
    name: `Name ${screenName}`,
    followers_count: 10,
    friends_count: 20,
    statuses_count: 30,
    following: true,
  };
}

/** `timeline.instructions` with one user entry per id and an optional bottom cursor. */
export function userInstructions(users: Array<{ id: string; screenName: string }>, bottomCursor?: string) {
  const entries: unknown[] = users.map((user) => ({
    entryId: `user-${user.id}`,
    content: {
      entryType: 'TimelineTimelineItem',
      itemContent: { itemType: 'TimelineUser', user_results: { result: rawUser(user.id, user.screenName) } },
    },
  }));
  if (bottomCursor) {
    entries.push({
      entryId: `cursor-bottom-${bottomCursor}`,
      content: { entryType: 'TimelineTimelineCursor', cursorType: 'Bottom', value: bottomCursor },
    });
  }
  return [{ type: 'TimelineAddEntries', entries }];
}

export function followersBody(users: Array<{ id: string; screenName: string }>, bottomCursor?: string) {
  return { data: { user: { result: { timeline: { timeline: { instructions: userInstructions(users, bottomCursor) } } } } } };
}

/** `timeline.instructions` with one tweet entry per raw tweet result. */
export function tweetInstructions(results: unknown[], bottomCursor?: string) {
  const entries: unknown[] = results.map((result, index) => ({
    entryId: `tweet-${index}`,
    content: {
      entryType: 'TimelineTimelineItem',
      itemContent: { itemType: 'TimelineTweet', tweet_results: { result } },
    },
  }));
  if (bottomCursor) {
    entries.push({
      entryId: `cursor-bottom-${bottomCursor}`,
      content: { entryType: 'TimelineTimelineCursor', cursorType: 'Bottom', value: bottomCursor },
    });
  }
  return [{ type: 'TimelineAddEntries', entries }];
}

export function userTweetsBody(results: unknown[], bottomCursor?: string) {
  return {
    data: { user: { result: { timeline_v2: { timeline: { instructions: tweetInstructions(results, bottomCursor) } } } } },
  };
}
