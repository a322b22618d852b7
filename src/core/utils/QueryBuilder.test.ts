import { describe, it, expect } from 'vitest';
import { buildQuery, forSearch, parseIgnoreFields, toGetParams, toSearchParams, NO_SUPPRESSION } from './QueryBuilder';
import { TrackMetadata } from '../interfaces/TrackMetadata';

const track: TrackMetadata = {
    title: 'Song',
    artists: ['Band', 'Guest'],
    album: 'Rec',
    duration: 200.5,
};

describe('parseIgnoreFields', () => {
    it('should recognise every accepted token', () => {
        expect(parseIgnoreFields(['duration', 'album', 'artist'])).toEqual({
            suppressDuration: true,
            suppressAlbum: true,
            suppressArtistOnSearch: true,
        });
        expect(parseIgnoreFields(['album_name', 'artist_name'])).toEqual({
            suppressDuration: false,
            suppressAlbum: true,
            suppressArtistOnSearch: true,
        });
    });

    it('should ignore unknown and differently cased tokens', () => {
        expect(parseIgnoreFields(['Duration', 'genre', ''])).toEqual(NO_SUPPRESSION);
    });
});

describe('buildQuery', () => {
    it('should copy every field and join artists', () => {
        expect(buildQuery(track)).toEqual({
            trackName: 'Song',
            artistName: 'Band, Guest',
            albumName: 'Rec',
            duration: 200.5,
        });
    });

    it('should drop duration when ignored', () => {
        const query = buildQuery(track, parseIgnoreFields(['duration']));
        expect(query.duration).toBeUndefined();
        expect(query.albumName).toBe('Rec');
    });

    it('should drop album for both album tokens', () => {
        expect(buildQuery(track, parseIgnoreFields(['album'])).albumName).toBeUndefined();
        expect(buildQuery(track, parseIgnoreFields(['album_name'])).albumName).toBeUndefined();
    });

    it('should keep the artist even when it is ignored', () => {
        const query = buildQuery(track, parseIgnoreFields(['artist']));
        expect(query.artistName).toBe('Band, Guest');
    });

    it('should use empty strings for missing title and artists', () => {
        expect(buildQuery({ title: '', artists: [] })).toEqual({ trackName: '', artistName: '' });
    });
});

describe('forSearch', () => {
    it('should clear the artist only when asked and leave the original alone', () => {
        const query = buildQuery(track);
        const searchQuery = forSearch(query, parseIgnoreFields(['artist']));
        expect(searchQuery.artistName).toBe('');
        expect(query.artistName).toBe('Band, Guest');
        expect(forSearch(query, NO_SUPPRESSION)).toBe(query);
    });
});

describe('request parameters', () => {
    it('should always send artist_name on get', () => {
        expect(toGetParams({ trackName: 'Song', artistName: '' })).toEqual([
            ['track_name', 'Song'],
            ['artist_name', ''],
        ]);
    });

    it('should send all four fields on get', () => {
        expect(toGetParams({ trackName: 'Song', artistName: 'Band', albumName: 'Rec', duration: 200 })).toEqual([
            ['track_name', 'Song'],
            ['artist_name', 'Band'],
            ['album_name', 'Rec'],
            ['duration', '200'],
        ]);
    });

    it('should skip an empty artist and never send duration on search', () => {
        expect(toSearchParams({ trackName: 'Song', artistName: '', albumName: 'Rec', duration: 200 })).toEqual([
            ['track_name', 'Song'],
            ['album_name', 'Rec'],
        ]);
    });
});
